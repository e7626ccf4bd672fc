import { DELTA_FIELDS, type DeltaMetrics, type SizeMetrics } from "@repometrics/core";

export const emptySizeMetrics = (): SizeMetrics => ({
  lines: 0,
  code: 0,
  comments: 0,
  blanks: 0,
  bytes: 0,
});

export const pickSizeMetrics = (value: SizeMetrics): SizeMetrics => ({
  lines: value.lines,
  code: value.code,
  comments: value.comments,
  blanks: value.blanks,
  bytes: value.bytes,
});

export const addSizeMetrics = (left: SizeMetrics, right: SizeMetrics): SizeMetrics => ({
  lines: left.lines + right.lines,
  code: left.code + right.code,
  comments: left.comments + right.comments,
  blanks: left.blanks + right.blanks,
  bytes: left.bytes + right.bytes,
});

export const zeroDeltaMetrics = (): DeltaMetrics => ({
  deltaLines: 0,
  deltaCode: 0,
  deltaComments: 0,
  deltaBlanks: 0,
  deltaBytes: 0,
});

export const subtractSizeMetrics = (current: SizeMetrics, previous: SizeMetrics): DeltaMetrics => ({
  deltaLines: current.lines - previous.lines,
  deltaCode: current.code - previous.code,
  deltaComments: current.comments - previous.comments,
  deltaBlanks: current.blanks - previous.blanks,
  deltaBytes: current.bytes - previous.bytes,
});

export const addAbsoluteDeltas = (total: DeltaMetrics, delta: DeltaMetrics): DeltaMetrics => {
  const next = { ...total };
  for (const field of DELTA_FIELDS) {
    next[field] = total[field] + Math.abs(delta[field]);
  }

  return next;
};

