// backend/services/shared/test/InMemoryRepo.spec.ts
import { describe, it, expect } from "vitest";
import { InMemoryRepo } from "../src/repo/InMemoryRepo";

type Row = { id: number; name: string };
type RowCreate = { name: string };

const make = (id: number, input: RowCreate): Row => ({ id, ...input });

describe("InMemoryRepo", () => {
  it("assigns max(id)+1 on create", async () => {
    const repo = new InMemoryRepo<Row, RowCreate>(make, [
      { id: 1, name: "a" },
      { id: 5, name: "b" },
    ]);
    expect(await repo.create({ name: "c" })).toEqual({ id: 6, name: "c" });
  });

  it("starts at 1 when empty", async () => {
    const repo = new InMemoryRepo<Row, RowCreate>(make);
    expect((await repo.create({ name: "first" })).id).toBe(1);
  });

  it("hands out copies, not live rows", async () => {
    const repo = new InMemoryRepo<Row, RowCreate>(make, [{ id: 1, name: "a" }]);
    const got = await repo.get(1);
    if (got) got.name = "mutated";
    expect(await repo.get(1)).toEqual({ id: 1, name: "a" });
  });

  it("does not share state between instances seeded from the same rows", async () => {
    const seed = [{ id: 1, name: "a" }];
    const one = new InMemoryRepo<Row, RowCreate>(make, seed);
    const two = new InMemoryRepo<Row, RowCreate>(make, seed);
    await one.create({ name: "b" });
    expect(await two.list()).toEqual([{ id: 1, name: "a" }]);
  });

  it("updates, keeping the id", async () => {
    const repo = new InMemoryRepo<Row, RowCreate>(make, [{ id: 3, name: "a" }]);
    expect(await repo.update(3, { name: "z" })).toEqual({ id: 3, name: "z" });
    expect(await repo.update(9, { name: "z" })).toBeUndefined();
  });

  it("reports whether delete removed anything", async () => {
    const repo = new InMemoryRepo<Row, RowCreate>(make, [{ id: 1, name: "a" }]);
    expect(await repo.delete(1)).toBe(true);
    expect(await repo.delete(1)).toBe(false);
    expect(await repo.list()).toEqual([]);
  });
});
