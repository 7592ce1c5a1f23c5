const HEADER_SIZE = 6;
const ENTRY_SIZE = 16;
const ICON_TYPE = 1;

export interface IcoEntry {
  width: number;
  height: number;
  bitsPerPixel: number;
  byteLength: number;
  offset: number;
}

/**
 * Reads the ICONDIR table of an `.ico` file. Width and height bytes of 0
 * stand for 256.
 */
export function readIcoEntries(buffer: Buffer): IcoEntry[] {
  if (buffer.length < HEADER_SIZE) {
    throw new Error(`ICO data too short: ${buffer.length} bytes`);
  }
  if (buffer.readUInt16LE(0) !== 0 || buffer.readUInt16LE(2) !== ICON_TYPE) {
    throw new Error('Not an ICO file');
  }

  const count = buffer.readUInt16LE(4);
  if (buffer.length < HEADER_SIZE + count * ENTRY_SIZE) {
    throw new Error(`ICO directory truncated: expected ${count} entries`);
  }

  const entries: IcoEntry[] = [];
  for (let i = 0; i < count; i++) {
    const at = HEADER_SIZE + i * ENTRY_SIZE;
    const entry: IcoEntry = {
      width: buffer.readUInt8(at) || 256,
      height: buffer.readUInt8(at + 1) || 256,
      bitsPerPixel: buffer.readUInt16LE(at + 6),
      byteLength: buffer.readUInt32LE(at + 8),
      offset: buffer.readUInt32LE(at + 12),
    };
    if (entry.offset + entry.byteLength > buffer.length) {
      throw new Error(`ICO entry ${i} (${entry.width}x${entry.height}) points past the end of the file`);
    }
    entries.push(entry);
  }
  return entries;
}
