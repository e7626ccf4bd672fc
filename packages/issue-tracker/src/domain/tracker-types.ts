export type TrackerItem = {
  id: string;
  createdAt: string;
  closedAt: string | null;
};

export type TrackerPage = {
  items: readonly TrackerItem[];
  nextCursor: string | null;
  hasMore: boolean;
  /** Why the page could not be fetched; such a page is empty and ends pagination. */
  failure: string | null;
};

export type RateLimit = {
  limit: number;
  remaining: number;
  resetAt: string;
};
