/**
 * Table of relations waiting for their members.
 *
 * Brings relations and their members together during a single pass over OSM
 * data. Relations are kept in an ItemStash; the table stores one slot per
 * relation, pairing the stash handle with the number of members the relation
 * is still waiting for. When that number reaches zero the relation is
 * complete.
 *
 * Slots are appended and never move. Removing a relation leaves a tombstone
 * in place so that positions cached elsewhere (see MembersDatabase) keep
 * pointing at the same slot.
 *
 * @example
 * ```ts
 * const stash = new ItemStash<OsmRelation>()
 * const db = new RelationsDatabase(stash)
 * const handle = db.add(relation)
 * const position = handle.position
 * const sameHandle = db.at(position)
 * ```
 *
 * @module
 */

import { assert } from "@osm-relations/shared/assert"
import type { OsmRelation } from "@osm-relations/shared/types"
import {
	INVALID_HANDLE,
	type ItemHandle,
	type ItemStash,
	isValidHandle,
} from "./item-stash"
import { RelationHandle } from "./relation-handle"
import {
	IndexArrayType,
	MAX_INDEX_VALUE,
	ResizeableTypedArray as RTA,
} from "./typed-arrays"

/**
 * A single slot of the table.
 */
export type RelationSlot =
	| { status: "occupied"; handle: ItemHandle; pending: number }
	| { status: "removed" }

export interface RelationsDatabaseOptions {
	/** Number of slots to reserve up front. */
	initialCapacity: number
}

const DEFAULT_OPTIONS: RelationsDatabaseOptions = {
	initialCapacity: 4096,
}

export class RelationsDatabase {
	/** Stash holding the relations themselves. */
	readonly stash: ItemStash<OsmRelation>

	// Slot columns, indexed by position.
	private handles: RTA<Uint32Array>
	private pending: RTA<Uint32Array>

	constructor(
		stash: ItemStash<OsmRelation>,
		options: Partial<RelationsDatabaseOptions> = {},
	) {
		const { initialCapacity } = { ...DEFAULT_OPTIONS, ...options }
		const initialBytes = initialCapacity * IndexArrayType.BYTES_PER_ELEMENT
		this.stash = stash
		this.handles = new RTA(IndexArrayType, initialBytes)
		this.pending = new RTA(IndexArrayType, initialBytes)
	}

	/**
	 * Number of slots, removed relations included. Never decreases.
	 */
	get size() {
		return this.handles.length
	}

	/**
	 * Store a relation and append a slot for it with no pending members.
	 *
	 * The relation object itself is stored, not a copy: later changes made by
	 * the caller are visible through every handle to it.
	 */
	add(relation: OsmRelation): RelationHandle {
		const handle = this.stash.addItem(relation)
		this.handles.push(handle)
		this.pending.push(0)
		return new RelationHandle(this, this.handles.length - 1)
	}

	/**
	 * Get a handle for the slot at `position`. Throws when out of bounds.
	 */
	at(position: number): RelationHandle {
		this.assertInBounds(position)
		return new RelationHandle(this, position)
	}

	/**
	 * Get a handle for a live relation, or null if `position` is out of bounds
	 * or the relation was removed.
	 */
	get(position: number): RelationHandle | null {
		if (!this.isValid(position)) return null
		return new RelationHandle(this, position)
	}

	/**
	 * Whether `position` refers to a relation that has not been removed.
	 */
	isValid(position: number): boolean {
		if (!Number.isInteger(position) || position < 0 || position >= this.size)
			return false
		return isValidHandle(this.handles.at(position))
	}

	slot(position: number): RelationSlot {
		this.assertInBounds(position)
		const handle = this.handles.at(position)
		if (!isValidHandle(handle)) return { status: "removed" }
		return { status: "occupied", handle, pending: this.pending.at(position) }
	}

	/**
	 * Number of relations not removed. Linear in `size`.
	 */
	countRelations(): number {
		let count = 0
		for (const handle of this.handles) {
			if (isValidHandle(handle)) count++
		}
		return count
	}

	/**
	 * Call `visitor` for every relation not removed, in position order. The
	 * visitor may remove the relation it was given. Relations added during
	 * the call are not visited.
	 */
	forEachRelation(visitor: (handle: RelationHandle) => void) {
		const end = this.size
		for (let position = 0; position < end; position++) {
			if (isValidHandle(this.handles.at(position))) {
				visitor(new RelationHandle(this, position))
			}
		}
	}

	*[Symbol.iterator](): Generator<RelationHandle> {
		const end = this.size
		for (let position = 0; position < end; position++) {
			if (isValidHandle(this.handles.at(position))) {
				yield new RelationHandle(this, position)
			}
		}
	}

	/**
	 * Bytes reserved for slots. Does not include the stash.
	 */
	usedMemory(): number {
		return this.handles.byteLength + this.pending.byteLength
	}

	/** @internal */
	getRelation(position: number): OsmRelation {
		return this.stash.get(this.liveHandle(position))
	}

	/** @internal */
	getMembers(position: number): number {
		this.liveHandle(position)
		return this.pending.at(position)
	}

	/** @internal */
	setMembers(position: number, value: number) {
		this.liveHandle(position)
		assert(
			Number.isInteger(value) && value >= 0 && value <= MAX_INDEX_VALUE,
			`Invalid member count ${value} for relation at position ${position}`,
		)
		this.pending.set(position, value)
	}

	/** @internal */
	remove(position: number) {
		this.stash.removeItem(this.liveHandle(position))
		this.handles.set(position, INVALID_HANDLE)
		this.pending.set(position, 0)
	}

	private assertInBounds(position: number) {
		if (!Number.isInteger(position) || position < 0 || position >= this.size)
			throw Error(`Index out of bounds: ${position}. Length: ${this.size}`)
	}

	private liveHandle(position: number): ItemHandle {
		this.assertInBounds(position)
		const handle = this.handles.at(position)
		assert(
			isValidHandle(handle),
			`Relation at position ${position} was removed`,
		)
		return handle
	}
}
