import { GearPiece } from "../models/types";

/**
 * Read-only gear catalog keyed by base id.
 */
export class GearRepository {
  private readonly byId: Map<string, GearPiece>;

  constructor(pieces: GearPiece[]) {
    this.byId = new Map(pieces.map(p => [p.baseId, p]));
  }

  /**
   * Get a gear piece by base id (e.g., "172Salvage")
   */
  getById(baseId: string): GearPiece | undefined {
    return this.byId.get(baseId);
  }

  /**
   * A piece with no ingredients is a raw material
   */
  isRawMaterial(piece: GearPiece): boolean {
    return piece.ingredients.length === 0;
  }

  get size(): number {
    return this.byId.size;
  }
}
