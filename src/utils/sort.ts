/**
 * Byte-wise comparison of the UTF-8 encodings, independent of locale
 */
export function compareBytes(a: string, b: string): number {
    return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}
