import type { OsmEntity, OsmRelation } from "@osm-relations/shared/types"
import { describe, expect, it, vi } from "vitest"
import {
	createAreaRelationsManager,
	createLineRelationsManager,
	RelationsManager,
	type ResolvedMember,
} from "../src/relations-manager"
import {
	mockMultipolygon,
	mockNode,
	mockRelation,
	mockWay,
} from "./mocks"

function collect() {
	const completed: { id: number; members: number[] }[] = []
	const onComplete = (relation: OsmRelation, members: ResolvedMember[]) => {
		completed.push({
			id: relation.id,
			members: members.map(({ entity }) => entity.id),
		})
	}
	return { completed, onComplete }
}

describe("RelationsManager", () => {
	it("completes a relation once its members arrive", () => {
		const { completed, onComplete } = collect()
		const manager = new RelationsManager({ onComplete })

		manager.addRelation(mockMultipolygon(1, [10, 11]))
		expect(completed).toEqual([])

		manager.addWay(mockWay(10))
		expect(completed).toEqual([])

		manager.addWay(mockWay(11))
		expect(completed).toEqual([{ id: 1, members: [10, 11] }])
		expect(manager.relations.countRelations()).toBe(0)
		expect(manager.members.size).toBe(0)
	})

	it("completes immediately when members arrived first", () => {
		const { completed, onComplete } = collect()
		const manager = new RelationsManager({ onComplete })

		manager.addWay(mockWay(10))
		manager.addWay(mockWay(11))
		manager.addRelation(mockMultipolygon(1, [11, 10]))

		expect(completed).toEqual([{ id: 1, members: [11, 10] }])
	})

	it("handles members arriving before and after the relation", () => {
		const { completed, onComplete } = collect()
		const manager = new RelationsManager({ onComplete })

		manager.addWay(mockWay(10))
		manager.addRelation(mockMultipolygon(1, [10, 11, 12]))
		expect(manager.relations.at(0).members).toBe(2)

		manager.addWay(mockWay(12))
		manager.addWay(mockWay(11))

		expect(completed).toEqual([{ id: 1, members: [10, 11, 12] }])
	})

	it("completes relations sharing a member in position order", () => {
		const { completed, onComplete } = collect()
		const manager = new RelationsManager({ onComplete })

		manager.addRelation(mockMultipolygon(2, [10]))
		manager.addRelation(mockMultipolygon(1, [10]))
		manager.addWay(mockWay(10))

		expect(completed.map(({ id }) => id)).toEqual([2, 1])
	})

	it("waits only on members passing the member filter", () => {
		const { completed, onComplete } = collect()
		const manager = new RelationsManager({
			onComplete,
			memberFilter: (_relation, member) => member.type === "way",
		})

		manager.addRelation(
			mockRelation(1, [
				{ type: "node", ref: 5, role: "label" },
				{ type: "way", ref: 10, role: "outer" },
			]),
		)
		manager.addWay(mockWay(10))

		expect(completed).toEqual([{ id: 1, members: [10] }])
	})

	it("ignores relations failing the relation filter", () => {
		const { completed, onComplete } = collect()
		const manager = new RelationsManager({
			onComplete,
			relationFilter: (relation) => relation.tags?.["type"] === "multipolygon",
		})

		manager.addRelation(mockRelation(1, [{ type: "way", ref: 10 }], "route"))
		manager.addWay(mockWay(10))

		expect(completed).toEqual([])
		expect(manager.stats().relations).toBe(0)
		expect(manager.getMember("relation", 1)?.id).toBe(1)
	})

	it("resolves relation members of super-relations", () => {
		const { completed, onComplete } = collect()
		const manager = new RelationsManager({
			onComplete,
			relationFilter: (relation) => relation.tags?.["type"] === "collection",
		})

		manager.addRelation(
			mockRelation(
				1,
				[
					{ type: "relation", ref: 2 },
					{ type: "node", ref: 3 },
				],
				"collection",
			),
		)
		manager.addRelation(mockRelation(2, [], "route"))
		manager.addNode(mockNode(3))

		expect(completed).toEqual([{ id: 1, members: [2, 3] }])
	})

	it("completes relations without members of interest right away", () => {
		const { completed, onComplete } = collect()
		const manager = new RelationsManager({ onComplete })

		manager.addRelation(mockRelation(1))

		expect(completed).toEqual([{ id: 1, members: [] }])
		expect(manager.stats()).toEqual({
			relations: 1,
			complete: 1,
			incomplete: 0,
			members: 1,
		})
	})

	it("rejects a relation added twice", () => {
		const manager = new RelationsManager({ onComplete: () => {} })
		manager.addRelation(mockMultipolygon(1, [10]))

		expect(() => manager.addRelation(mockMultipolygon(1, [10]))).toThrow(
			"Relation 1 was already added",
		)
	})

	it("replaces a member seen twice", () => {
		const manager = new RelationsManager({ onComplete: () => {} })
		manager.addWay(mockWay(10, [1, 2]))
		manager.addWay(mockWay(10, [3, 4]))

		expect(manager.getMember("way", 10)).toEqual(mockWay(10, [3, 4]))
		expect(manager.stats().members).toBe(1)
	})

	it("keeps the stored member when an identical one arrives again", () => {
		const manager = new RelationsManager({ onComplete: () => {} })
		const first = mockWay(10)
		manager.addWay(first)
		manager.addWay(mockWay(10))

		expect(manager.getMember("way", 10)).toBe(first)
		expect(manager.stats().members).toBe(1)
	})

	it("keeps the stored relation when a duplicate id is rejected", () => {
		const manager = new RelationsManager({ onComplete: () => {} })
		manager.addRelation(mockMultipolygon(1, [10]))

		expect(() => manager.addRelation(mockMultipolygon(1, [11]))).toThrow(
			"Relation 1 was already added",
		)
		expect(manager.getMember("relation", 1)).toEqual(
			mockMultipolygon(1, [10]),
		)
		expect(manager.members.positionsFor("way", 11)).toEqual([])
	})

	it("visits relations that are still incomplete", () => {
		const manager = new RelationsManager({ onComplete: () => {} })
		manager.addRelation(mockMultipolygon(1, [10]))
		manager.addRelation(mockMultipolygon(2, [11]))
		manager.addRelation(mockMultipolygon(3, [12]))
		manager.addWay(mockWay(11))

		const incomplete: number[] = []
		manager.forEachIncompleteRelation((handle) => {
			incomplete.push(handle.relation.id)
		})

		expect(incomplete).toEqual([1, 3])
		expect(manager.stats()).toEqual({
			relations: 3,
			complete: 1,
			incomplete: 2,
			members: 4,
		})
	})

	it("processes a stream of entities and reports progress", async () => {
		const { completed, onComplete } = collect()
		const messages: string[] = []
		const manager = new RelationsManager({
			onComplete,
			onProgress: (message) => messages.push(message),
			progressInterval: Number.POSITIVE_INFINITY,
		})

		async function* entities(): AsyncGenerator<OsmEntity> {
			yield mockMultipolygon(1, [10, 11])
			yield mockWay(10)
			yield mockMultipolygon(2, [12])
			yield mockWay(11)
		}

		const stats = await manager.processEntities(entities())

		expect(completed.map(({ id }) => id)).toEqual([1])
		expect(stats).toEqual({
			relations: 2,
			complete: 1,
			incomplete: 1,
			members: 4,
		})
		expect(messages).toEqual([
			"1 entities processed, 0 relations complete",
			"Processed 4 entities. Completed 1 relations, 1 incomplete.",
		])
	})

	it("accepts synchronous iterables", async () => {
		const onProgress = vi.fn()
		const { completed, onComplete } = collect()
		const manager = new RelationsManager({ onComplete, onProgress })

		await manager.processEntities([
			mockWay(10),
			mockNode(1),
			mockMultipolygon(1, [10]),
		])

		expect(completed).toEqual([{ id: 1, members: [10] }])
		expect(onProgress).toHaveBeenLastCalledWith(
			"Processed 3 entities. Completed 1 relations, 0 incomplete.",
		)
	})

	it("leaves a relation in place when onComplete throws", () => {
		const manager = new RelationsManager({
			onComplete: () => {
				throw Error("sink failed")
			},
		})
		manager.addRelation(mockMultipolygon(1, [10]))

		expect(() => manager.addWay(mockWay(10))).toThrow("sink failed")
		expect(manager.relations.countRelations()).toBe(1)
	})

	it("completes the other relations sharing a member when onComplete throws", () => {
		const seen: number[] = []
		const manager = new RelationsManager({
			onComplete: (relation) => {
				if (relation.id === 1) throw Error("sink failed")
				seen.push(relation.id)
			},
		})
		manager.addRelation(mockMultipolygon(1, [10]))
		manager.addRelation(mockMultipolygon(2, [10]))

		expect(() => manager.addWay(mockWay(10))).toThrow("sink failed")
		expect(seen).toEqual([2])
		expect(manager.relations.countRelations()).toBe(1)
		expect(manager.relations.at(0).hasAllMembers()).toBe(true)

		const incomplete: number[] = []
		manager.forEachIncompleteRelation((handle) => {
			incomplete.push(handle.relation.id)
		})
		expect(incomplete).toEqual([])
		expect(manager.stats()).toEqual({
			relations: 2,
			complete: 1,
			incomplete: 0,
			members: 3,
		})
	})

	it("sets the member count once and counts down members already seen", () => {
		const manager = new RelationsManager({ onComplete: () => {} })
		manager.addWay(mockWay(10))
		manager.addWay(mockWay(11))

		const relation = mockMultipolygon(1, [10, 11, 12, 12])
		manager.addRelation(relation)

		expect(manager.relations.at(0).members).toBe(2)
		expect(manager.members.positionsFor("way", 12)).toEqual([0, 0])
	})
})

describe("createAreaRelationsManager", () => {
	it("assembles multipolygons from outer and inner ways", () => {
		const { completed, onComplete } = collect()
		const manager = createAreaRelationsManager(onComplete, {
			onProgress: () => {},
		})

		manager.addRelation(
			mockRelation(1, [
				{ type: "way", ref: 10, role: "outer" },
				{ type: "way", ref: 11, role: "inner" },
				{ type: "node", ref: 5, role: "label" },
			]),
		)
		manager.addRelation(mockRelation(2, [{ type: "way", ref: 10 }], "route"))
		manager.addWay(mockWay(11))
		expect(completed).toEqual([])

		manager.addWay(mockWay(10))
		expect(completed).toEqual([{ id: 1, members: [10, 11] }])
		expect(manager.stats().relations).toBe(1)
	})
})

describe("createLineRelationsManager", () => {
	it("assembles routes from their ways only", () => {
		const { completed, onComplete } = collect()
		const manager = createLineRelationsManager(onComplete, {
			onProgress: () => {},
		})

		manager.addRelation(
			mockRelation(
				1,
				[
					{ type: "way", ref: 10, role: "forward" },
					{ type: "node", ref: 5, role: "stop" },
					{ type: "way", ref: 11 },
				],
				"route",
			),
		)
		manager.addRelation(mockMultipolygon(2, [10]))
		expect(manager.relations.at(0).members).toBe(2)

		manager.addWay(mockWay(11))
		manager.addWay(mockWay(10))

		expect(completed).toEqual([{ id: 1, members: [10, 11] }])
		expect(manager.stats().relations).toBe(1)
	})
})
