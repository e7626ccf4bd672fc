export const COMMIT_RECORD_SEPARATOR = "\u001e";
export const COMMIT_FIELD_SEPARATOR = "\u001f";

// hash, author, author email, author time, committer, committer email, committer time,
// parents, encoding, signature status, raw body
export const GIT_LOG_FORMAT = `%x1e${[
  "%H",
  "%an",
  "%ae",
  "%at",
  "%cn",
  "%ce",
  "%ct",
  "%P",
  "%e",
  "%G?",
  "%B",
].join("%x1f")}`;

export const GIT_LOG_FIELD_COUNT = 11;

export const TAG_REF_FORMAT = [
  "%(refname:short)",
  "%(objecttype)",
  "%(objectname)",
  "%(*objecttype)",
  "%(*objectname)",
].join("%1f");

export const TAG_FIELD_COUNT = 5;
