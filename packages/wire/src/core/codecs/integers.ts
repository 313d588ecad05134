import type { Codec } from "../../ports/codec"
import { fixed } from "./fixed"

function checkNumber(min: number, max: number) {
  return (value: number): string | undefined => {
    if (!Number.isInteger(value)) return `${value} is not an integer`
    if (value < min || value > max) return `${value} is outside ${min}..${max}`
    return undefined
  }
}

function checkBigInt(min: bigint, max: bigint) {
  return (value: bigint): string | undefined => {
    if (typeof value !== "bigint") return `${String(value)} is not a bigint`
    if (value < min || value > max) return `${value} is outside ${min}..${max}`
    return undefined
  }
}

export const u8: Codec<number> = fixed({
  name: "u8",
  size: 1,
  check: checkNumber(0, 0xff),
  write: (view, value) => view.setUint8(0, value),
  read: (view) => view.getUint8(0),
})

export const i8: Codec<number> = fixed({
  name: "i8",
  size: 1,
  check: checkNumber(-0x80, 0x7f),
  write: (view, value) => view.setInt8(0, value),
  read: (view) => view.getInt8(0),
})

export const u16: Codec<number> = fixed({
  name: "u16",
  size: 2,
  check: checkNumber(0, 0xffff),
  write: (view, value) => view.setUint16(0, value),
  read: (view) => view.getUint16(0),
})

export const i16: Codec<number> = fixed({
  name: "i16",
  size: 2,
  check: checkNumber(-0x8000, 0x7fff),
  write: (view, value) => view.setInt16(0, value),
  read: (view) => view.getInt16(0),
})

export const u32: Codec<number> = fixed({
  name: "u32",
  size: 4,
  check: checkNumber(0, 0xffffffff),
  write: (view, value) => view.setUint32(0, value),
  read: (view) => view.getUint32(0),
})

export const i32: Codec<number> = fixed({
  name: "i32",
  size: 4,
  check: checkNumber(-0x80000000, 0x7fffffff),
  write: (view, value) => view.setInt32(0, value),
  read: (view) => view.getInt32(0),
})

const U64_MAX = (1n << 64n) - 1n
const I64_MIN = -(1n << 63n)
const I64_MAX = (1n << 63n) - 1n
const U128_MAX = (1n << 128n) - 1n
const I128_MIN = -(1n << 127n)
const I128_MAX = (1n << 127n) - 1n

export const u64: Codec<bigint> = fixed({
  name: "u64",
  size: 8,
  check: checkBigInt(0n, U64_MAX),
  write: (view, value) => view.setBigUint64(0, value),
  read: (view) => view.getBigUint64(0),
})

export const i64: Codec<bigint> = fixed({
  name: "i64",
  size: 8,
  check: checkBigInt(I64_MIN, I64_MAX),
  write: (view, value) => view.setBigInt64(0, value),
  read: (view) => view.getBigInt64(0),
})

// 128-bit values are two big-endian 64-bit halves, high half first.
export const u128: Codec<bigint> = fixed({
  name: "u128",
  size: 16,
  check: checkBigInt(0n, U128_MAX),
  write: (view, value) => {
    view.setBigUint64(0, value >> 64n)
    view.setBigUint64(8, BigInt.asUintN(64, value))
  },
  read: (view) => (view.getBigUint64(0) << 64n) | view.getBigUint64(8),
})

export const i128: Codec<bigint> = fixed({
  name: "i128",
  size: 16,
  check: checkBigInt(I128_MIN, I128_MAX),
  write: (view, value) => {
    view.setBigInt64(0, value >> 64n)
    view.setBigUint64(8, BigInt.asUintN(64, value))
  },
  read: (view) => (view.getBigInt64(0) << 64n) | view.getBigUint64(8),
})
