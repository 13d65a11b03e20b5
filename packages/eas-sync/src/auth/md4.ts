/**
 * @exsync/eas-sync - MD4
 *
 * NTLM password hashing needs MD4, which OpenSSL 3 only exposes through
 * its legacy provider. `md4` prefers the native digest and falls back to
 * the RFC 1320 implementation below when the runtime refuses it.
 */

import { createHash } from 'crypto';

type Quad = readonly [number, number, number, number];

interface Md4Round {
  mix: (x: number, y: number, z: number) => number;
  constant: number;
  shifts: Quad;
  /** Word order, one quad per group of four steps */
  order: readonly Quad[];
}

const ROUNDS: readonly Md4Round[] = [
  {
    mix: (x, y, z) => (x & y) | (~x & z),
    constant: 0,
    shifts: [3, 7, 11, 19],
    order: [
      [0, 1, 2, 3],
      [4, 5, 6, 7],
      [8, 9, 10, 11],
      [12, 13, 14, 15],
    ],
  },
  {
    mix: (x, y, z) => (x & y) | (x & z) | (y & z),
    constant: 0x5a827999,
    shifts: [3, 5, 9, 13],
    order: [
      [0, 4, 8, 12],
      [1, 5, 9, 13],
      [2, 6, 10, 14],
      [3, 7, 11, 15],
    ],
  },
  {
    mix: (x, y, z) => x ^ y ^ z,
    constant: 0x6ed9eba1,
    shifts: [3, 9, 11, 15],
    order: [
      [0, 8, 4, 12],
      [2, 10, 6, 14],
      [1, 9, 5, 13],
      [3, 11, 7, 15],
    ],
  },
];

function rotateLeft(value: number, bits: number): number {
  return (value << bits) | (value >>> (32 - bits));
}

function pad(input: Buffer): Buffer {
  const paddedLength = (Math.floor((input.length + 8) / 64) + 1) * 64;
  const padded = Buffer.alloc(paddedLength);
  input.copy(padded);
  padded[input.length] = 0x80;
  padded.writeBigUInt64LE(BigInt(input.length) * 8n, paddedLength - 8);
  return padded;
}

/**
 * Pure MD4 digest (RFC 1320)
 */
export function md4Fallback(input: Buffer): Buffer {
  const padded = pad(input);
  let a = 0x67452301;
  let b = 0xefcdab89 | 0;
  let c = 0x98badcfe | 0;
  let d = 0x10325476;

  for (let offset = 0; offset < padded.length; offset += 64) {
    const word = (index: number): number => padded.readInt32LE(offset + index * 4);
    const start: Quad = [a, b, c, d];

    for (const round of ROUNDS) {
      const [s0, s1, s2, s3] = round.shifts;
      const step = (index: number, shift: number): void => {
        const sum = (a + round.mix(b, c, d) + word(index) + round.constant) | 0;
        const next = rotateLeft(sum, shift);
        a = d;
        d = c;
        c = b;
        b = next;
      };
      for (const [k0, k1, k2, k3] of round.order) {
        step(k0, s0);
        step(k1, s1);
        step(k2, s2);
        step(k3, s3);
      }
    }

    a = (a + start[0]) | 0;
    b = (b + start[1]) | 0;
    c = (c + start[2]) | 0;
    d = (d + start[3]) | 0;
  }

  const digest = Buffer.alloc(16);
  [a, b, c, d].forEach((value, index) => digest.writeInt32LE(value, index * 4));
  return digest;
}

/**
 * MD4 digest, native when available
 */
export function md4(input: Buffer): Buffer {
  try {
    return createHash('md4').update(input).digest();
  } catch {
    return md4Fallback(input);
  }
}
