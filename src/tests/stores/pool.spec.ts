import { describe, expect, it } from "vitest";
import { TenantClientPool } from "../../stores/pool";
import { delay } from "../fakes";

interface Handle {
  tenantId: string;
  serial: number;
}

function pool(options: { maxEntries?: number; idleMs?: number; createMs?: number } = {}) {
  const created: string[] = [];
  const disposed: string[] = [];
  const instance = new TenantClientPool<Handle>({
    maxEntries: options.maxEntries,
    idleMs: options.idleMs,
    create: async (tenantId) => {
      created.push(tenantId);
      await delay(options.createMs ?? 5);
      return { tenantId, serial: created.length };
    },
    dispose: async (_handle, tenantId) => {
      disposed.push(tenantId);
    }
  });
  return { instance, created, disposed };
}

describe("TenantClientPool", () => {
  it("shares one creation between concurrent first requests", async () => {
    const { instance, created } = pool();
    const [first, second] = await Promise.all([instance.get("acme"), instance.get("acme")]);

    expect(first).toBe(second);
    expect(created).toEqual(["acme"]);
    expect(instance.stats()).toEqual({ size: 1, hits: 0, misses: 1, evictions: 0 });
  });

  it("returns the resident handle on later requests", async () => {
    const { instance } = pool();
    const first = await instance.get("acme");
    const again = await instance.get("acme");

    expect(again).toBe(first);
    expect(instance.stats().hits).toBe(1);
  });

  it("evicts the least recently used tenant past capacity", async () => {
    const { instance, disposed } = pool({ maxEntries: 2 });
    await instance.get("a");
    await instance.get("b");
    await instance.get("a");
    await instance.get("c");

    expect(instance.has("a")).toBe(true);
    expect(instance.has("b")).toBe(false);
    expect(instance.has("c")).toBe(true);
    expect(disposed).toEqual(["b"]);
    expect(instance.stats().evictions).toBe(1);
  });

  it("drops idle tenants and recreates them on demand", async () => {
    const { instance, created, disposed } = pool({ idleMs: 100 });
    await instance.get("a");
    await delay(60);
    await instance.get("b");
    await delay(60);

    expect(instance.evictIdle()).toBe(1);
    expect(disposed).toEqual(["a"]);
    expect(instance.has("b")).toBe(true);

    const recreated = await instance.get("a");
    expect(recreated.serial).toBe(3);
    expect(created).toEqual(["a", "b", "a"]);
  });

  it("disposes everything on close", async () => {
    const { instance, disposed } = pool();
    await instance.get("a");
    await instance.get("b");
    await instance.closeAll();

    expect(disposed.sort()).toEqual(["a", "b"]);
    expect(instance.stats().size).toBe(0);
    expect(instance.stats().evictions).toBe(0);
  });

  it("disposes handles whose creation finishes during close", async () => {
    const { instance, disposed } = pool({ createMs: 40 });
    const creation = instance.get("late");
    await instance.closeAll();

    await creation;
    expect(disposed).toEqual(["late"]);
    expect(instance.has("late")).toBe(false);
  });
});
