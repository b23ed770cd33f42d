const REPLACEMENT_CHAR = 0xfffd;

function scalarAt(value: string, index: number): number {
  const code = value.codePointAt(index) ?? 0;
  return code >= 0xd800 && code <= 0xdfff ? REPLACEMENT_CHAR : code;
}

// UTF-8 byte order equals code point order.
export function utf8ByteCompare(a: string, b: string): number {
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const ca = scalarAt(a, i);
    const cb = scalarAt(b, j);
    if (ca !== cb) return ca - cb;
    i += ca > 0xffff ? 2 : 1;
    j += cb > 0xffff ? 2 : 1;
  }
  return (a.length - i) - (b.length - j);
}
