/** Encodes ASCII and the basic Cyrillic alphabet (plus ё/Ё) as windows-1251. */
export function encodeCp1251(text: string): Buffer {
  const bytes: number[] = [];
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0;
    if (code < 0x80) {
      bytes.push(code);
    } else if (code >= 0x0410 && code <= 0x044f) {
      bytes.push(code - 0x0350);
    } else if (code === 0x0401) {
      bytes.push(0xa8);
    } else if (code === 0x0451) {
      bytes.push(0xb8);
    } else {
      throw new Error(`No windows-1251 byte for U+${code.toString(16)}`);
    }
  }
  return Buffer.from(bytes);
}
