/**
 * Append-only object store handing out stable handles.
 *
 * Items live in a dense array that is compacted once enough of them have been
 * removed. Callers never index the storage directly: every access goes through
 * a handle, and a handle → storage index table keeps handles stable when
 * compaction moves items around.
 *
 * @module
 */

import { assert, assertValue } from "@osm-relations/shared/assert"
import {
	IndexArrayType,
	MAX_INDEX_VALUE,
	ResizeableTypedArray as RTA,
} from "./typed-arrays"

/** Opaque handle to an item in an ItemStash. */
export type ItemHandle = number

/** Handle value that never refers to an item. */
export const INVALID_HANDLE: ItemHandle = MAX_INDEX_VALUE

// Marks a handle whose item has been removed.
const REMOVED = MAX_INDEX_VALUE

export function isValidHandle(handle: ItemHandle) {
	return handle !== INVALID_HANDLE
}

export interface ItemStashOptions {
	/** Label used when timing compaction. */
	name: string
	/** Removed items tolerated before compaction is considered. */
	compactMinGarbage: number
	/** Share of storage that must be garbage before compaction runs. */
	compactGarbageRatio: number
}

export const DEFAULT_ITEM_STASH_OPTIONS: ItemStashOptions = {
	name: "ItemStash",
	compactMinGarbage: 10_000,
	compactGarbageRatio: 0.5,
}

// Rough per-item cost of the storage arrays (two references per item).
const BYTES_PER_STORED_ITEM = 16

export class ItemStash<T extends object> {
	private options: ItemStashOptions

	// Dense storage. `null` entries are removed items waiting for compaction.
	private items: (T | null)[] = []
	// Storage index → handle, used to patch the handle table on compaction.
	private itemHandles: ItemHandle[] = []
	// Handle → storage index, or REMOVED.
	private handleIndex = new RTA(IndexArrayType)

	private removedItems = 0

	constructor(options: Partial<ItemStashOptions> = {}) {
		this.options = { ...DEFAULT_ITEM_STASH_OPTIONS, ...options }
	}

	/** Number of live items. */
	get count() {
		return this.items.length - this.removedItems
	}

	/** Number of handles handed out, removed ones included. */
	get size() {
		return this.handleIndex.length
	}

	/** Removed items still occupying storage. */
	get garbage() {
		return this.removedItems
	}

	/**
	 * Store an item and return a new handle for it.
	 */
	addItem(item: T): ItemHandle {
		if (this.handleIndex.length >= MAX_INDEX_VALUE)
			throw Error(`${this.options.name} is full`)
		const handle = this.handleIndex.push(this.items.length)
		this.items.push(item)
		this.itemHandles.push(handle)
		return handle
	}

	has(handle: ItemHandle): boolean {
		return (
			Number.isInteger(handle) &&
			handle >= 0 &&
			handle < this.handleIndex.length &&
			this.handleIndex.at(handle) !== REMOVED
		)
	}

	/**
	 * Get the item stored under a handle. The item itself is returned, so
	 * changes made to it are seen by later calls.
	 */
	get(handle: ItemHandle): T {
		const item = this.items[this.storageIndex(handle)]
		assertValue(item, `No item for handle ${handle}`)
		return item
	}

	/**
	 * Remove the item stored under a handle. The handle becomes invalid; every
	 * other handle stays valid.
	 */
	removeItem(handle: ItemHandle) {
		const index = this.storageIndex(handle)
		this.items[index] = null
		this.handleIndex.set(handle, REMOVED)
		this.removedItems++

		const { compactMinGarbage, compactGarbageRatio } = this.options
		if (
			this.removedItems >= compactMinGarbage &&
			this.removedItems >= this.items.length * compactGarbageRatio
		) {
			this.compact()
		}
	}

	/**
	 * Move live items down over removed ones and shrink the storage.
	 */
	compact() {
		if (this.removedItems === 0) return
		console.time(`${this.options.name}.compact`)
		let write = 0
		for (let read = 0; read < this.items.length; read++) {
			const item = this.items[read]
			const handle = this.itemHandles[read]
			if (item === null || item === undefined || handle === undefined) continue
			this.items[write] = item
			this.itemHandles[write] = handle
			this.handleIndex.set(handle, write)
			write++
		}
		this.items.length = write
		this.itemHandles.length = write
		this.removedItems = 0
		console.timeEnd(`${this.options.name}.compact`)
	}

	/**
	 * Drop every item. Handles start again from 0 afterwards.
	 */
	clear() {
		this.items = []
		this.itemHandles = []
		this.handleIndex.clear()
		this.removedItems = 0
	}

	/**
	 * Estimate of the bytes used by the stash's own bookkeeping. Does not
	 * include the items themselves.
	 */
	usedMemory() {
		return (
			this.handleIndex.byteLength +
			this.items.length * BYTES_PER_STORED_ITEM
		)
	}

	private storageIndex(handle: ItemHandle) {
		assert(
			handle >= 0 && handle < this.handleIndex.length,
			`Invalid handle: ${handle}`,
		)
		const index = this.handleIndex.at(handle)
		assert(index !== REMOVED, `Item for handle ${handle} was removed`)
		return index
	}
}
