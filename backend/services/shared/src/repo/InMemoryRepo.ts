// backend/services/shared/src/repo/InMemoryRepo.ts
import type { IRepo, WithId } from "./IRepo";

/**
 * Array-backed IRepo. Ids are max(id)+1, so a delete of the highest id
 * frees it for reuse. `make` turns validated input plus the new id into a row.
 */
export class InMemoryRepo<T extends WithId, TCreate> implements IRepo<T, TCreate> {
  private readonly rows: T[];
  private readonly make: (id: number, input: TCreate) => T;

  constructor(make: (id: number, input: TCreate) => T, seed: readonly T[] = []) {
    this.make = make;
    this.rows = seed.map((r) => ({ ...r }));
  }

  public async list(): Promise<T[]> {
    return this.rows.map((r) => ({ ...r }));
  }

  public async get(id: number): Promise<T | undefined> {
    const hit = this.rows.find((r) => r.id === id);
    return hit ? { ...hit } : undefined;
  }

  public async create(input: TCreate): Promise<T> {
    const id = this.rows.reduce((max, r) => Math.max(max, r.id), 0) + 1;
    const row = this.make(id, input);
    this.rows.push(row);
    return { ...row };
  }

  public async update(
    id: number,
    patch: Partial<Omit<T, "id">>
  ): Promise<T | undefined> {
    const idx = this.rows.findIndex((r) => r.id === id);
    if (idx < 0) return undefined;
    const next = { ...this.rows[idx], ...patch, id };
    this.rows[idx] = next;
    return { ...next };
  }

  public async delete(id: number): Promise<boolean> {
    const idx = this.rows.findIndex((r) => r.id === id);
    if (idx < 0) return false;
    this.rows.splice(idx, 1);
    return true;
  }
}
