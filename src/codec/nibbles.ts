// Hex-prefix ("compact") encoding of nibble paths in trie leaf and extension nodes.
//
//   flag nibble: 0 = extension/even, 1 = extension/odd, 2 = leaf/even, 3 = leaf/odd
//   even paths carry a zero pad nibble after the flag

export type Nibbles = readonly number[];

export const toNibbles = (bytes: Uint8Array): number[] => {
  const out: number[] = new Array(bytes.length * 2);
  bytes.forEach((b, i) => {
    out[2 * i] = b >> 4;
    out[2 * i + 1] = b & 0x0f;
  });
  return out;
};

export const encodeHexPrefix = (path: Nibbles, isLeaf: boolean): Uint8Array => {
  const odd = path.length % 2 === 1;
  const flag = (isLeaf ? 2 : 0) + (odd ? 1 : 0);
  const all = odd ? [flag, ...path] : [flag, 0, ...path];
  const out = new Uint8Array(all.length / 2);
  for (let i = 0; i < out.length; i++) out[i] = (all[2 * i] << 4) | all[2 * i + 1];
  return out;
};

export const decodeHexPrefix = (
  encoded: Uint8Array,
): { nibbles: number[]; isLeaf: boolean } | undefined => {
  if (encoded.length === 0) return undefined;
  const all = toNibbles(encoded);
  const flag = all[0];
  if (flag > 3) return undefined;
  const odd = (flag & 1) === 1;
  if (!odd && all[1] !== 0) return undefined;
  return { nibbles: all.slice(odd ? 1 : 2), isLeaf: flag >= 2 };
};

export const startsWith = (path: Nibbles, at: number, prefix: Nibbles): boolean => {
  if (at + prefix.length > path.length) return false;
  return prefix.every((n, i) => path[at + i] === n);
};
