/**
 * Index from relation members to the relations waiting on them.
 *
 * Stores relation positions rather than handles; they are turned back into
 * handles through the RelationsDatabase when a member shows up.
 *
 * @module
 */

import type { OsmEntityType } from "@osm-relations/shared/types"
import { memberKey } from "@osm-relations/shared/utils"
import MultiMap from "./multimap"
import type { RelationsDatabase } from "./relations-database"

export class MembersDatabase {
	readonly relations: RelationsDatabase

	// `type/id` → positions of the relations waiting on that member
	private waiting = new MultiMap<string, number>()
	// position → member keys tracked for it, for untrack()
	private tracked = new MultiMap<number, string>()
	private entries = 0

	constructor(relations: RelationsDatabase) {
		this.relations = relations
	}

	/** Number of distinct members being waited on. */
	get size() {
		return this.waiting.size
	}

	/** Number of (member, relation) entries. */
	get count() {
		return this.entries
	}

	/**
	 * Record that the relation at `position` waits on a member. Does not touch
	 * the relation's member counter.
	 */
	track(type: OsmEntityType, id: number, position: number) {
		const key = memberKey(type, id)
		this.waiting.add(key, position)
		this.tracked.add(position, key)
		this.entries++
	}

	positionsFor(type: OsmEntityType, id: number): readonly number[] {
		return this.waiting.get(memberKey(type, id)) ?? []
	}

	/**
	 * A member was seen: count it as found for every relation waiting on it
	 * and stop tracking it. Relations listing the member more than once are
	 * decremented once per listing.
	 *
	 * @returns Positions of the relations that now have all their members, in
	 * ascending order.
	 */
	memberFound(type: OsmEntityType, id: number): number[] {
		const key = memberKey(type, id)
		const positions = this.waiting.get(key)
		if (!positions) return []
		this.waiting.delete(key)
		this.entries -= positions.length

		const completed = new Set<number>()
		for (const position of positions) {
			this.tracked.removeValue(position, key)
			const handle = this.relations.get(position)
			if (handle === null) continue
			handle.decrementMembers()
			if (handle.hasAllMembers()) completed.add(position)
		}
		return Array.from(completed).sort((a, b) => a - b)
	}

	/**
	 * Forget every entry of the relation at `position`, e.g. after removing
	 * it before it was complete.
	 */
	untrack(position: number) {
		const keys = this.tracked.get(position)
		if (!keys) return
		this.tracked.delete(position)
		for (const key of keys) {
			if (this.waiting.removeValue(key, position)) this.entries--
		}
	}

	clear() {
		this.waiting.clear()
		this.tracked.clear()
		this.entries = 0
	}
}
