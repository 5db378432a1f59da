/**
 * Test-only TLV assembly. Lengths are written in the shortest form.
 */
export function tlv(tag: number, ...parts: Uint8Array[]): Uint8Array {
  const content = concat(...parts);
  const len = content.length;
  const lengthBytes: number[] = [];
  if (len < 128) {
    lengthBytes.push(len);
  } else {
    let temp = len;
    while (temp > 0) {
      lengthBytes.unshift(temp & 0xff);
      temp = Math.floor(temp / 256);
    }
    lengthBytes.unshift(0x80 | lengthBytes.length);
  }
  return concat(Uint8Array.of(tag, ...lengthBytes), content);
}

export function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.length;
  }
  return out;
}

export function filled(size: number, value: number): Uint8Array {
  return new Uint8Array(size).fill(value);
}

/** Deterministic linear congruential generator, values in [0, 1). */
export function seededRandom(seed: number): () => number {
  let state = seed & 0x7fffffff;
  return () => {
    state = (state * 1103515245 + 12345) & 0x7fffffff;
    return state / 0x80000000;
  };
}

/**
 * Wrap bytes so that any indexed read at or past the end throws, and record
 * the highest index read.
 */
export function guardedBytes(bytes: Uint8Array): {
  view: Uint8Array;
  maxRead: () => number;
} {
  let max = -1;
  const view = new Proxy(bytes, {
    get(target, prop) {
      if (typeof prop === "string" && /^\d+$/.test(prop)) {
        const index = Number(prop);
        if (index >= target.length) {
          throw new RangeError(`read at ${index} past end ${target.length}`);
        }
        max = Math.max(max, index);
      }
      const value: unknown = Reflect.get(target, prop, target);
      return typeof value === "function" ? value.bind(target) : value;
    },
  });
  return { view, maxRead: () => max };
}
