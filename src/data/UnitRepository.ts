import { Unit } from "../models/types";

/**
 * Read-only unit catalog keyed by base id.
 */
export class UnitRepository {
  private readonly byId: Map<string, Unit>;

  constructor(units: Unit[]) {
    this.byId = new Map(units.map(u => [u.baseId, u]));
  }

  /**
   * Get unit metadata by base id (e.g., "VADER")
   */
  getById(baseId: string): Unit | undefined {
    return this.byId.get(baseId);
  }

  get size(): number {
    return this.byId.size;
  }
}
