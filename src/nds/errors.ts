/**
 * Thrown when a packed tile ID carries no level marker bit.
 */
export class MalformedTileIdError extends Error {
  readonly packedId: number;

  constructor(packedId: number) {
    super(`Invalid packed Tile ID ${packedId}: No Level bit present.`);
    this.name = "MalformedTileIdError";
    this.packedId = packedId;
  }
}
