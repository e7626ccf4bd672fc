import type { TrackerKind } from "@repometrics/core";
import { z } from "zod";
import type { TrackerClient } from "../application/tracker-client.js";
import { createEffectiveTrackerConfig, type TrackerConfig } from "../config.js";
import type { RateLimit, TrackerItem, TrackerPage } from "../domain/tracker-types.js";
import { fetchJsonWithRetry, type FetchFunction, type FetchJsonResult } from "./fetch-json-with-retry.js";

const CONNECTION_BY_KIND: Record<TrackerKind, string> = {
  issues: "issues",
  pull_requests: "pullRequests",
};

const RATE_LIMIT_FIELDS = "rateLimit { limit remaining resetAt }";

// `items` aliases the connection so one response schema serves issues and pull requests
const countQuery = (connection: string): string =>
  `query($owner: String!, $name: String!) {
  repository(owner: $owner, name: $name) { items: ${connection} { totalCount } }
  ${RATE_LIMIT_FIELDS}
}`;

const pageQuery = (connection: string): string =>
  `query($owner: String!, $name: String!, $first: Int!, $after: String) {
  repository(owner: $owner, name: $name) {
    items: ${connection}(first: $first, after: $after, orderBy: { field: CREATED_AT, direction: ASC }) {
      pageInfo { endCursor hasNextPage }
      nodes { id createdAt closedAt }
    }
  }
  ${RATE_LIMIT_FIELDS}
}`;

const rateLimitSchema = z
  .object({ limit: z.number(), remaining: z.number(), resetAt: z.string() })
  .nullish();

const errorsSchema = z.array(z.object({ message: z.string() })).optional();

const countResponseSchema = z.object({
  data: z
    .object({
      repository: z.object({ items: z.object({ totalCount: z.number().int() }) }).nullable(),
      rateLimit: rateLimitSchema,
    })
    .nullish(),
  errors: errorsSchema,
});

const pageResponseSchema = z.object({
  data: z
    .object({
      repository: z
        .object({
          items: z.object({
            pageInfo: z.object({ endCursor: z.string().nullable(), hasNextPage: z.boolean() }),
            nodes: z.array(
              z
                .object({ id: z.string(), createdAt: z.string(), closedAt: z.string().nullable() })
                .nullable(),
            ),
          }),
        })
        .nullable(),
      rateLimit: rateLimitSchema,
    })
    .nullish(),
  errors: errorsSchema,
});

export type GitHubTrackerClientOptions = {
  owner: string;
  repository: string;
  token: string;
  config?: Partial<TrackerConfig>;
  fetchImpl?: FetchFunction;
};

const failedPage = (failure: string): TrackerPage => ({
  items: [],
  nextCursor: null,
  hasMore: false,
  failure,
});

export class GitHubTrackerClient implements TrackerClient {
  private readonly config: TrackerConfig;
  private rateLimit: RateLimit | null = null;

  constructor(private readonly options: GitHubTrackerClientOptions) {
    this.config = createEffectiveTrackerConfig(options.config);
  }

  get lastRateLimit(): RateLimit | null {
    return this.rateLimit;
  }

  async totalCount(kind: TrackerKind): Promise<number | null> {
    const result = await this.query(countQuery(CONNECTION_BY_KIND[kind]), {});
    if (!result.ok) {
      return null;
    }

    const parsed = countResponseSchema.safeParse(result.payload);
    if (!parsed.success) {
      return null;
    }

    this.rateLimit = parsed.data.data?.rateLimit ?? this.rateLimit;
    return parsed.data.data?.repository?.items.totalCount ?? null;
  }

  async page(kind: TrackerKind, cursor: string | null): Promise<TrackerPage> {
    const result = await this.query(pageQuery(CONNECTION_BY_KIND[kind]), {
      first: this.config.pageSize,
      after: cursor,
    });
    if (!result.ok) {
      return failedPage(result.reason);
    }

    const parsed = pageResponseSchema.safeParse(result.payload);
    if (!parsed.success) {
      return failedPage("unexpected response shape");
    }

    const { data, errors } = parsed.data;
    this.rateLimit = data?.rateLimit ?? this.rateLimit;
    const firstError = errors?.[0];
    if (firstError !== undefined) {
      return failedPage(firstError.message);
    }

    const connection = data?.repository?.items;
    if (connection === undefined) {
      return failedPage(`repository ${this.options.owner}/${this.options.repository} not found`);
    }

    const items: TrackerItem[] = connection.nodes.flatMap((node) => (node === null ? [] : [node]));
    return {
      items,
      nextCursor: connection.pageInfo.endCursor,
      hasMore: connection.pageInfo.hasNextPage,
      failure: null,
    };
  }

  private query(query: string, variables: Record<string, unknown>): Promise<FetchJsonResult> {
    return fetchJsonWithRetry(
      {
        url: this.config.endpoint,
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.options.token}`,
          "Content-Type": "application/json",
          "User-Agent": "repometrics",
        },
        body: {
          query,
          variables: { owner: this.options.owner, name: this.options.repository, ...variables },
        },
      },
      { retries: this.config.retries, baseDelayMs: this.config.baseDelayMs },
      this.options.fetchImpl,
    );
  }
}
