export type UintWidth = 1 | 2 | 4 | 8

/** Big-endian unsigned encoding of `value` in `width` bytes. */
export function encodeUint(value: number | bigint, width: UintWidth): Uint8Array {
  const bytes = new Uint8Array(width)
  const view = new DataView(bytes.buffer)

  switch (width) {
    case 1:
      view.setUint8(0, Number(value))
      break
    case 2:
      view.setUint16(0, Number(value))
      break
    case 4:
      view.setUint32(0, Number(value))
      break
    case 8:
      view.setBigUint64(0, BigInt(value))
      break
  }

  return bytes
}

export function decodeUint(bytes: Uint8Array): bigint {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)

  switch (bytes.byteLength) {
    case 1:
      return BigInt(view.getUint8(0))
    case 2:
      return BigInt(view.getUint16(0))
    case 4:
      return BigInt(view.getUint32(0))
    case 8:
      return view.getBigUint64(0)
    default:
      throw new RangeError(`unsupported unsigned width ${bytes.byteLength}`)
  }
}

/** Narrowest width that holds `max`. */
export function uintWidthFor(max: number): UintWidth {
  if (max <= 0xff) return 1
  if (max <= 0xffff) return 2
  if (max <= 0xffffffff) return 4
  return 8
}
