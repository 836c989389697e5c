/**
 * JSON codec for stored values. bigint has no JSON form, so it is written as
 * {"$bigint":"<decimal>"} and revived on the way back.
 */

type BigintTag = { $bigint: string }

function isBigintTag(v: unknown): v is BigintTag {
  if (typeof v !== 'object' || v === null) return false
  if (!('$bigint' in v) || Object.keys(v).length !== 1) return false
  return typeof v.$bigint === 'string'
}

export function encodeValue(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? { $bigint: v.toString() } : v))
}

export function decodeValue(text: string): unknown {
  return JSON.parse(text, (_key, v: unknown) => (isBigintTag(v) ? BigInt(v.$bigint) : v))
}
