import { TAG_FIELD_COUNT } from "../domain/git-log-format.js";
import type { TagTarget } from "../domain/revision-types.js";

const FIELD_SEPARATOR = "\u001f";

const resolveCommit = (
  objectType: string,
  objectName: string,
  peeledType: string,
  peeledName: string,
): string | null => {
  if (objectType === "commit" && objectName.length > 0) {
    return objectName;
  }

  // annotated tag: follow it to the object it points at
  if (objectType === "tag" && peeledType === "commit" && peeledName.length > 0) {
    return peeledName;
  }

  return null;
};

export const parseTagRefs = (rawRefs: string): readonly TagTarget[] => {
  const targets: TagTarget[] = [];

  for (const line of rawRefs.split("\n")) {
    if (line.trim().length === 0) {
      continue;
    }

    const fields = line.split(FIELD_SEPARATOR).map((field) => field.trim());
    if (fields.length !== TAG_FIELD_COUNT) {
      continue;
    }

    const [tag, objectType, objectName, peeledType, peeledName] = fields;
    if (
      tag === undefined ||
      objectType === undefined ||
      objectName === undefined ||
      peeledType === undefined ||
      peeledName === undefined ||
      tag.length === 0
    ) {
      continue;
    }

    targets.push({
      tag,
      commitHash: resolveCommit(objectType, objectName, peeledType, peeledName),
    });
  }

  return targets;
};
