import baseX from "base-x"

const ALPHABET = "123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz"
const b58 = baseX(ALPHABET)

export const prefixes = {
  user: "usr",
  peer: "peer",
  intent: "int",
  referral: "ref",
  request: "req",
} as const

const EPOCH = 1_700_000_000_000
const MAX_COUNTER = 0xfff

// last timestamp and the counter used to keep ids monotonic within a millisecond
let lastTimestamp = 0
let counter = 0

/**
 * Time-sortable prefixed id: 48 bits of milliseconds since EPOCH, a 12 bit
 * counter and random bytes, base58 encoded and padded so ids sort lexically.
 */
export function newId<TPrefix extends keyof typeof prefixes>(
  prefix: TPrefix
): `${(typeof prefixes)[TPrefix]}_${string}` {
  const buf = crypto.getRandomValues(new Uint8Array(16))

  let timestamp = Math.max(Date.now() - EPOCH, 0)

  if (timestamp <= lastTimestamp) {
    timestamp = lastTimestamp
    counter++
    if (counter > MAX_COUNTER) {
      timestamp++
      counter = 0
    }
  } else {
    counter = 0
  }
  lastTimestamp = timestamp

  // 48 bits do not fit bitwise ops, split into high 16 and low 32
  const high = Math.floor(timestamp / 2 ** 32)
  const low = timestamp % 2 ** 32
  buf[0] = (high >>> 8) & 0xff
  buf[1] = high & 0xff
  buf[2] = (low >>> 24) & 0xff
  buf[3] = (low >>> 16) & 0xff
  buf[4] = (low >>> 8) & 0xff
  buf[5] = low & 0xff
  buf[6] = (0x7 << 4) | ((counter >> 8) & 0x0f)
  buf[7] = counter & 0xff

  const encoded = b58.encode(buf).padStart(22, ALPHABET[0])

  return `${prefixes[prefix]}_${encoded}` as const
}

export function randomId(): string {
  return b58.encode(crypto.getRandomValues(new Uint8Array(16))).padStart(22, ALPHABET[0])
}

/**
 * Milliseconds since the unix epoch at which the id was generated
 */
export function getTimestampFromId(id: string): number {
  const encoded = id.split("_").pop()
  if (!encoded) {
    throw new Error("Invalid ID format: missing encoded part")
  }

  const decoded = b58.decode(encoded)
  const buf = decoded.subarray(Math.max(0, decoded.length - 16))
  if (buf.length < 6) {
    throw new Error("Invalid ID format: buffer too short")
  }

  const [b0 = 0, b1 = 0, b2 = 0, b3 = 0, b4 = 0, b5 = 0] = buf
  const high = (b0 << 8) | b1
  const low = ((b2 << 24) >>> 0) + ((b3 << 16) | (b4 << 8) | b5)

  return high * 2 ** 32 + low + EPOCH
}
