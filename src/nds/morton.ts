/**
 * Morton Codec
 *
 * Interleaves NDS longitude/latitude units into a single Z-order code and
 * back. Bit 2i holds longitude bit i, bit 2i+1 holds latitude bit i, for
 * i in [0, 30]. Bit 62 flags a negative longitude and bit 61 a negative
 * latitude. For any latitude in [-2^30, 2^30) bit 61 is also latitude bit
 * 30, so decoding reads latitude as a 31-bit two's complement value and
 * longitude as a 32-bit one whose top bit comes from bit 62.
 */

/** Number of interleaved payload bits per axis */
const PAYLOAD_BITS = 31n;

const LONGITUDE_SIGN_BIT = 62n;
const LATITUDE_SIGN_BIT = 61n;

const MAX_U64 = (1n << 64n) - 1n;

/** Longitude/latitude pair in NDS units */
export interface MortonPair {
  longitude: number;
  latitude: number;
}

/**
 * Encode a longitude/latitude pair as a Morton code.
 *
 * @param longitude - Longitude in NDS units (signed 32-bit)
 * @param latitude - Latitude in NDS units (signed 31-bit)
 */
export function encodeMorton(longitude: number, latitude: number): bigint {
  const lon = BigInt(longitude);
  const lat = BigInt(latitude);

  let code = 0n;
  for (let i = 0n; i < PAYLOAD_BITS; i++) {
    // BigInt shifts are arithmetic, so negative values yield their
    // two's complement bits here.
    if ((lon >> i) & 1n) code |= 1n << (2n * i);
    if ((lat >> i) & 1n) code |= 1n << (2n * i + 1n);
  }

  if (longitude < 0) code |= 1n << LONGITUDE_SIGN_BIT;
  if (latitude < 0) code |= 1n << LATITUDE_SIGN_BIT;
  return code;
}

/**
 * Decode a Morton code back into NDS longitude/latitude units.
 *
 * @param code - Unsigned 64-bit Morton code
 * @throws RangeError if the code is not an unsigned 64-bit value
 */
export function decodeMorton(code: bigint): MortonPair {
  if (code < 0n || code > MAX_U64) {
    throw new RangeError(
      `Morton code ${code.toString()} exceeds the unsigned 64-bit range.`
    );
  }

  let lon = 0n;
  let lat = 0n;
  for (let i = 0n; i < PAYLOAD_BITS; i++) {
    lon |= ((code >> (2n * i)) & 1n) << i;
    lat |= ((code >> (2n * i + 1n)) & 1n) << i;
  }
  lon |= ((code >> LONGITUDE_SIGN_BIT) & 1n) << PAYLOAD_BITS;

  return {
    longitude: Number(BigInt.asIntN(32, lon)),
    latitude: Number(BigInt.asIntN(31, lat)),
  };
}
