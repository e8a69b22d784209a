export const BI_POWS = new Array(46)
  .fill(0)
  .map((_0, index) => BigInt(10) ** BigInt(index));

export const BI_MAX_UINT112 = 2n ** 112n - 1n;
