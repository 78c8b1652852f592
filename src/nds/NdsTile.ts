/**
 * NDS Tile
 *
 * Hierarchical tiling of the globe on top of the NDS Morton code. Level 0
 * splits the world into an east (tile 0) and a west (tile 1) hemisphere;
 * each following level splits every tile into four. A tile number is the
 * top 2 * level + 1 bits of the Morton code of any coordinate inside it,
 * and a packed tile ID marks the level with bit 16 + level.
 */

import type { Feature, Polygon } from "geojson";
import {
  MAX_LEVEL,
  MAX_LONGITUDE,
  MIN_LONGITUDE,
  LONGITUDE_RANGE,
  LATITUDE_RANGE,
} from "./constants";
import { NdsCoordinate } from "./NdsCoordinate";
import { NdsBBox } from "./NdsBBox";
import { MalformedTileIdError } from "./errors";
import { Wgs84Coordinate } from "../wgs84/Wgs84Coordinate";
import { createLogger } from "../log";
import { logBinary } from "../debug/binary";

const log = createLogger("NdsTile");

/** Bit offset of the level 0 marker in a packed tile ID */
const LEVEL_MARKER_OFFSET = 16;

/** Tile position in the level's grid, origin at lon 0 / lat 0 */
export interface GridCoordinates {
  col: number;
  row: number;
}

export type TileCoordinate = NdsCoordinate | Wgs84Coordinate;

function toNdsCoordinate(coordinate: TileCoordinate): NdsCoordinate {
  return coordinate instanceof NdsCoordinate
    ? coordinate
    : NdsCoordinate.fromWgs84(coordinate);
}

/** Number of low Morton code bits below a tile number at this level */
function mortonShift(level: number): bigint {
  return BigInt(32 + (MAX_LEVEL - level) * 2);
}

function maxTileNumber(level: number): number {
  return 2 ** (2 * level + 1) - 1;
}

function verifyLevel(level: number): void {
  if (!Number.isInteger(level) || level < 0 || level > MAX_LEVEL) {
    throw new RangeError(
      `The Tile level ${level} exceeds the range [0, ${MAX_LEVEL}].`
    );
  }
}

export class NdsTile {
  readonly level: number;
  readonly tileNumber: number;

  private cachedCenter: NdsCoordinate | null = null;

  private constructor(level: number, tileNumber: number) {
    this.level = level;
    this.tileNumber = tileNumber;
  }

  /**
   * Create a tile from its level and tile number.
   *
   * @throws RangeError if the level is outside [0, 15] or the tile number
   * outside [0, 2^(2 * level + 1) - 1]
   */
  static fromLevelAndNumber(level: number, tileNumber: number): NdsTile {
    verifyLevel(level);
    if (!Number.isInteger(tileNumber) || tileNumber < 0) {
      throw new RangeError(
        `The Tile number ${tileNumber} must be a non-negative integer (Max length is 31 bits).`
      );
    }
    const max = maxTileNumber(level);
    if (tileNumber > max) {
      throw new RangeError(
        `Invalid Tile number ${tileNumber} for level ${level}, numbers 0 .. ${max} are allowed.`
      );
    }
    return new NdsTile(level, tileNumber);
  }

  /**
   * Create the tile at a level that contains a coordinate.
   */
  static fromLevelAndCoordinate(
    level: number,
    coordinate: TileCoordinate
  ): NdsTile {
    verifyLevel(level);
    const morton = toNdsCoordinate(coordinate).mortonCode();
    return new NdsTile(level, Number(morton >> mortonShift(level)));
  }

  /**
   * Create a tile from a packed tile ID.
   *
   * Negative IDs are read as their unsigned 32-bit pattern, so a set sign
   * bit is the level 15 marker.
   *
   * @throws RangeError if the ID is not a 32-bit integer
   * @throws MalformedTileIdError if no level marker bit is set
   */
  static fromPackedId(packedId: number): NdsTile {
    logBinary(log, packedId >>> 0, "Packed ID binary");
    const level = NdsTile.extractLevel(packedId);
    if (level < 0) {
      throw new MalformedTileIdError(packedId);
    }
    const tileNumber = (packedId >>> 0) - 2 ** (LEVEL_MARKER_OFFSET + level);
    return NdsTile.fromLevelAndNumber(level, tileNumber);
  }

  /**
   * Level encoded in a packed tile ID: the highest set marker bit
   * 16 + level. Returns -1 when no marker is present.
   *
   * @throws RangeError if the ID is not a 32-bit integer
   */
  static extractLevel(packedId: number): number {
    if (
      !Number.isInteger(packedId) ||
      packedId < -(2 ** 31) ||
      packedId > 2 ** 32 - 1
    ) {
      throw new RangeError(
        `Packed Tile ID ${packedId} is not a 32-bit integer.`
      );
    }
    const bits = packedId >>> 0;
    for (let level = MAX_LEVEL; level >= 0; level--) {
      if ((bits >>> (LEVEL_MARKER_OFFSET + level)) & 1) {
        return level;
      }
    }
    return -1;
  }

  /**
   * Check whether a coordinate lies in this tile.
   */
  contains(coordinate: TileCoordinate): boolean {
    const morton = toNdsCoordinate(coordinate).mortonCode();
    return Number(morton >> mortonShift(this.level)) === this.tileNumber;
  }

  packedId(): number {
    return this.tileNumber + 2 ** (LEVEL_MARKER_OFFSET + this.level);
  }

  /**
   * Morton code of the tile's south-west corner. The bits dropped when
   * deriving the tile number are all zero at that corner.
   */
  southWestAsMorton(): bigint {
    return BigInt(this.tileNumber) << mortonShift(this.level);
  }

  /** Center of the tile, computed on first access */
  center(): NdsCoordinate {
    if (this.cachedCenter === null) {
      this.cachedCenter = this.computeCenter();
    }
    return this.cachedCenter;
  }

  private computeCenter(): NdsCoordinate {
    if (this.level === 0) {
      return this.tileNumber === 0
        ? NdsCoordinate.fromUnits(Math.floor(MAX_LONGITUDE / 2), 0)
        : NdsCoordinate.fromUnits(Math.floor(MIN_LONGITUDE / 2), 0);
    }

    const southWestMorton = this.southWestAsMorton();
    logBinary(log, southWestMorton, "South west morton code binary");

    // Negative corners sit one unit further from zero than positive ones,
    // hence the extra unit on the negative side.
    const sw = NdsCoordinate.fromMorton(southWestMorton);
    const lat =
      sw.latitude +
      Math.floor(LATITUDE_RANGE / 2 ** (this.level + 1)) +
      (sw.latitude < 0 ? 1 : 0);
    const lon =
      sw.longitude +
      Math.floor(LONGITUDE_RANGE / 2 ** (this.level + 2)) +
      (sw.longitude < 0 ? 1 : 0);
    return NdsCoordinate.fromUnits(lon, lat);
  }

  bbox(): NdsBBox {
    if (this.level === 0) {
      return this.tileNumber === 0
        ? NdsBBox.eastHemisphere()
        : NdsBBox.westHemisphere();
    }

    const sw = NdsCoordinate.fromMorton(this.southWestAsMorton());
    const north =
      sw.latitude +
      Math.floor(LATITUDE_RANGE / 2 ** this.level) +
      (sw.latitude < 0 ? 1 : 0);
    const east =
      sw.longitude +
      Math.floor(LONGITUDE_RANGE / 2 ** (this.level + 1)) +
      (sw.longitude < 0 ? 1 : 0);
    return new NdsBBox(north, east, sw.latitude, sw.longitude);
  }

  /**
   * Position of this tile in its level's grid, decoded from the tile
   * number's interleaved bits: even bits form the column, odd bits the
   * row. Both are two's complement, so tiles west of the prime meridian
   * have negative columns and tiles south of the equator negative rows.
   *
   * Level 1 (tile numbers below their grid coordinates):
   *
   *   [-2,  0] [-1,  0] [0,  0] [1,  0]      4  5  0  1
   *   [-2, -1] [-1, -1] [0, -1] [1, -1]      6  7  2  3
   *
   * Level 2:
   *
   *   [-4,  1] [-3,  1] [-2,  1] [-1,  1] [0,  1] [1,  1] [2,  1] [3,  1]
   *   [-4,  0] [-3,  0] [-2,  0] [-1,  0] [0,  0] [1,  0] [2,  0] [3,  0]
   *   [-4, -1] [-3, -1] [-2, -1] [-1, -1] [0, -1] [1, -1] [2, -1] [3, -1]
   *   [-4, -2] [-3, -2] [-2, -2] [-1, -2] [0, -2] [1, -2] [2, -2] [3, -2]
   *
   *   18 19 22 23  2  3  6  7
   *   16 17 20 21  0  1  4  5
   *   26 27 30 31 10 11 14 15
   *   24 25 28 29  8  9 12 13
   */
  gridCoordinates(): GridCoordinates {
    if (this.level === 0) {
      return this.tileNumber === 0 ? { col: 0, row: 0 } : { col: -1, row: 0 };
    }

    let col = 0;
    let row = 0;
    for (let i = 0; i <= this.level; i++) {
      col |= ((this.tileNumber >>> (2 * i)) & 1) << i;
      row |= ((this.tileNumber >>> (2 * i + 1)) & 1) << i;
    }

    return {
      col: col < 2 ** this.level ? col : col - 2 ** (this.level + 1),
      row: row < 2 ** (this.level - 1) ? row : row - 2 ** this.level,
    };
  }

  equals(other: NdsTile): boolean {
    return this.level === other.level && this.tileNumber === other.tileNumber;
  }

  /** GeoJSON "Polygon" feature of the tile's bounding box */
  toGeoJSON(): Feature<Polygon> {
    return this.bbox().toGeoJSON();
  }

  toString(): string {
    return `${this.level}/${this.tileNumber}`;
  }
}
