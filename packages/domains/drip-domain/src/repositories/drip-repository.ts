import type { Drip } from '../entities/drip.js';

export interface DripRepository {
  findById(id: string): Promise<Drip | null>;
  findByName(name: string): Promise<Drip | null>;
  /** Persists the drip together with its rules, dropping removed ones. */
  save(drip: Drip): Promise<void>;
}
