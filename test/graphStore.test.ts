import { InMemoryGraphStore, isGraphStore } from "../graphStore.js";
import { makeGraph, makeNode } from "./helpers.js";

describe("InMemoryGraphStore", () => {
    const first = makeGraph([makeNode("a", "input")], [], "id-1", "Shared");
    const second = makeGraph([], [], "id-2", "id-1");

    it("should resolve by id before name", async () => {
        const store = new InMemoryGraphStore([first, second]);

        await expect(store.resolve("id-1")).resolves.toBe(first);
        await expect(store.resolve("Shared")).resolves.toBe(first);
        await expect(store.resolve("unknown")).resolves.toBeUndefined();
    });

    it("should save, list and delete graphs", async () => {
        const store = new InMemoryGraphStore();
        store.save(first);
        store.save(second);

        expect(store.list().map((graph) => graph.graphId)).toEqual(["id-1", "id-2"]);
        expect(store.delete("id-1")).toBe(true);
        expect(store.delete("id-1")).toBe(false);
        await expect(store.resolve("id-1")).resolves.toBe(second);
    });

    it("should recognise graph stores", () => {
        expect(isGraphStore(new InMemoryGraphStore())).toBe(true);
        expect(isGraphStore({ resolve: async () => undefined })).toBe(true);
        expect(isGraphStore({})).toBe(false);
        expect(isGraphStore(null)).toBe(false);
    });
});
