import {
  COMMIT_FIELD_SEPARATOR,
  COMMIT_RECORD_SEPARATOR,
  GIT_LOG_FIELD_COUNT,
} from "../domain/git-log-format.js";
import type { CoAuthor, RawRevision } from "../domain/revision-types.js";

export type ParseGitLogProgressEvent = {
  parsedRecords: number;
  totalRecords: number;
};

const DEFAULT_ENCODING = "UTF-8";

const CO_AUTHOR_TRAILER = /^co-authored-by:\s*(.*?)\s*<([^>]*)>\s*$/gim;

const parseInteger = (value: string): number | null => {
  if (value.length === 0) {
    return null;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    return null;
  }

  return parsed;
};

export const normalizeEmail = (email: string): string => email.trim().toLowerCase();

export const parseCoAuthors = (message: string): readonly CoAuthor[] => {
  const coAuthors: CoAuthor[] = [];
  for (const match of message.matchAll(CO_AUTHOR_TRAILER)) {
    const [, name, email] = match;
    if (name === undefined || email === undefined || email.trim().length === 0) {
      continue;
    }

    coAuthors.push({ name: name.trim(), email: normalizeEmail(email) });
  }

  return coAuthors;
};

const parseParents = (value: string): readonly string[] =>
  value
    .split(" ")
    .map((parent) => parent.trim())
    .filter((parent) => parent.length > 0);

export const parseGitLog = (
  rawLog: string,
  onProgress?: (event: ParseGitLogProgressEvent) => void,
): readonly RawRevision[] => {
  const records = rawLog
    .split(COMMIT_RECORD_SEPARATOR)
    .filter((record) => record.trim().length > 0);

  const revisions: RawRevision[] = [];

  records.forEach((record, index) => {
    onProgress?.({ parsedRecords: index + 1, totalRecords: records.length });

    const fields = record.split(COMMIT_FIELD_SEPARATOR);
    if (fields.length < GIT_LOG_FIELD_COUNT) {
      return;
    }

    const [
      hash,
      author,
      authorEmail,
      authoredAtRaw,
      committer,
      committerEmail,
      committedAtRaw,
      parentsRaw,
      encodingRaw,
      signatureRaw,
    ] = fields;
    // the body is last and may itself contain the separator
    const message = fields.slice(GIT_LOG_FIELD_COUNT - 1).join(COMMIT_FIELD_SEPARATOR).trimEnd();

    if (
      hash === undefined ||
      author === undefined ||
      authorEmail === undefined ||
      authoredAtRaw === undefined ||
      committer === undefined ||
      committerEmail === undefined ||
      committedAtRaw === undefined ||
      parentsRaw === undefined ||
      encodingRaw === undefined ||
      signatureRaw === undefined
    ) {
      return;
    }

    const authoredAtUnix = parseInteger(authoredAtRaw.trim());
    const committedAtUnix = parseInteger(committedAtRaw.trim());
    if (authoredAtUnix === null || committedAtUnix === null || hash.trim().length === 0) {
      return;
    }

    revisions.push({
      hash: hash.trim(),
      author: author.trim(),
      authorEmail: normalizeEmail(authorEmail),
      authoredAtUnix,
      committer: committer.trim(),
      committerEmail: normalizeEmail(committerEmail),
      committedAtUnix,
      message,
      encoding: encodingRaw.trim().length > 0 ? encodingRaw.trim() : DEFAULT_ENCODING,
      signature: signatureRaw.trim(),
      parentHashes: parseParents(parentsRaw),
      coAuthors: parseCoAuthors(message),
    });
  });

  return revisions;
};
