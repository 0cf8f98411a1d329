// backend/services/shared/src/repo/IRepo.ts
/**
 * Purpose:
 * - Storage seam for the entity services. Handlers talk to this interface
 *   only; the backing store is an app-owned instance, never module state.
 */

export type WithId = { id: number };

export interface IRepo<T extends WithId, TCreate = Omit<T, "id">> {
  list(): Promise<T[]>;
  get(id: number): Promise<T | undefined>;
  create(input: TCreate): Promise<T>;
  /** Shallow-merge `patch` into the record; undefined when the id is unknown. */
  update(id: number, patch: Partial<Omit<T, "id">>): Promise<T | undefined>;
  /** True when a record was removed. */
  delete(id: number): Promise<boolean>;
}
