/**
 * Single-pass relation assembly.
 *
 * Feeds nodes, ways and relations, in any order, through a RelationsDatabase
 * and a MembersDatabase and reports each relation of interest once every
 * member it waits on has been seen.
 *
 * @module
 */

import { assertValue } from "@osm-relations/shared/assert"
import {
	countMembersOfInterest,
	isAreaMember,
	isAreaRelation,
	isLineMember,
	isLineRelation,
} from "@osm-relations/shared/relation-kind"
import { throttle } from "@osm-relations/shared/throttle"
import type {
	OsmEntity,
	OsmEntityType,
	OsmNode,
	OsmRelation,
	OsmRelationMember,
	OsmWay,
} from "@osm-relations/shared/types"
import {
	getEntityType,
	isRelation,
	isSameEntityContent,
	memberKey,
} from "@osm-relations/shared/utils"
import { type ItemHandle, ItemStash } from "./item-stash"
import { MembersDatabase } from "./members-database"
import type { RelationHandle } from "./relation-handle"
import {
	RelationsDatabase,
	type RelationsDatabaseOptions,
} from "./relations-database"

/** A relation member together with the entity it refers to. */
export interface ResolvedMember {
	member: OsmRelationMember
	entity: OsmEntity
}

export interface RelationsManagerOptions
	extends Partial<RelationsDatabaseOptions> {
	/** Relations to assemble. Defaults to every relation. */
	relationFilter?: (relation: OsmRelation) => boolean
	/** Members a relation waits on. Defaults to every member. */
	memberFilter?: (relation: OsmRelation, member: OsmRelationMember) => boolean
	/**
	 * Called once per relation when all its members have been seen. The
	 * relation is removed from the database after this returns.
	 */
	onComplete: (relation: OsmRelation, members: ResolvedMember[]) => void
	onProgress?: (message: string) => void
	/** Minimum time between progress messages, in milliseconds. */
	progressInterval?: number
}

export interface ManagerStats {
	/** Relations of interest added so far. */
	relations: number
	/** Relations reported through `onComplete`. */
	complete: number
	/** Relations still waiting on members. */
	incomplete: number
	/** Entities kept for member resolution. */
	members: number
}

const DEFAULT_PROGRESS = console.log
const DEFAULT_PROGRESS_INTERVAL = 1_000

const everyRelation = () => true
const everyMember = () => true

export class RelationsManager {
	readonly relations: RelationsDatabase
	readonly members: MembersDatabase

	private relationFilter: (relation: OsmRelation) => boolean
	private memberFilter: (
		relation: OsmRelation,
		member: OsmRelationMember,
	) => boolean
	private onComplete: RelationsManagerOptions["onComplete"]
	private onProgress: (message: string) => void
	private progressInterval: number

	// Every entity seen so far, so relations arriving later can resolve it.
	private memberStash = new ItemStash<OsmEntity>({ name: "MemberStash" })
	private memberHandles = new Map<string, ItemHandle>()
	private relationIds = new Set<number>()
	private completed = 0

	constructor(options: RelationsManagerOptions) {
		this.relations = new RelationsDatabase(
			new ItemStash<OsmRelation>({ name: "RelationStash" }),
			options,
		)
		this.members = new MembersDatabase(this.relations)
		this.relationFilter = options.relationFilter ?? everyRelation
		this.memberFilter = options.memberFilter ?? everyMember
		this.onComplete = options.onComplete
		this.onProgress = options.onProgress ?? DEFAULT_PROGRESS
		this.progressInterval =
			options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL
	}

	addNode(node: OsmNode) {
		this.addMember("node", node)
	}

	addWay(way: OsmWay) {
		this.addMember("way", way)
	}

	addRelation(relation: OsmRelation) {
		const ofInterest = this.relationFilter(relation)
		if (ofInterest && this.relationIds.has(relation.id))
			throw Error(`Relation ${relation.id} was already added`)
		this.storeMember("relation", relation)
		if (ofInterest) this.addRelationOfInterest(relation)
		this.completeWaiting("relation", relation.id)
	}

	addEntity(entity: OsmEntity) {
		if (isRelation(entity)) this.addRelation(entity)
		else this.addMember(getEntityType(entity), entity)
	}

	/**
	 * Feed a stream of entities through the manager.
	 */
	async processEntities(
		entities: Iterable<OsmEntity> | AsyncIterable<OsmEntity>,
	): Promise<ManagerStats> {
		const logProgress = throttle(this.onProgress, this.progressInterval)
		let entityCount = 0
		for await (const entity of entities) {
			this.addEntity(entity)
			entityCount++
			logProgress(
				`${entityCount.toLocaleString()} entities processed, ${this.completed.toLocaleString()} relations complete`,
			)
		}
		const stats = this.stats()
		this.onProgress(
			`Processed ${entityCount.toLocaleString()} entities. Completed ${stats.complete.toLocaleString()} relations, ${stats.incomplete.toLocaleString()} incomplete.`,
		)
		return stats
	}

	/**
	 * Visit every relation still waiting on members. Relations whose
	 * `onComplete` call threw stay in the database with all members and are
	 * not visited.
	 */
	forEachIncompleteRelation(visitor: (handle: RelationHandle) => void) {
		this.relations.forEachRelation((handle) => {
			if (!handle.hasAllMembers()) visitor(handle)
		})
	}

	/**
	 * Get a stored member entity, or null if it has not been seen.
	 */
	getMember(type: OsmEntityType, id: number): OsmEntity | null {
		const handle = this.memberHandles.get(memberKey(type, id))
		if (handle === undefined) return null
		return this.memberStash.get(handle)
	}

	stats(): ManagerStats {
		return {
			relations: this.relations.size,
			complete: this.completed,
			incomplete: this.countIncomplete(),
			members: this.memberStash.count,
		}
	}

	private countIncomplete() {
		let count = 0
		this.forEachIncompleteRelation(() => count++)
		return count
	}

	private addMember(type: OsmEntityType, entity: OsmEntity) {
		this.storeMember(type, entity)
		this.completeWaiting(type, entity.id)
	}

	private storeMember(type: OsmEntityType, entity: OsmEntity) {
		const key = memberKey(type, entity.id)
		const previous = this.memberHandles.get(key)
		if (previous !== undefined) {
			// Keep the stored copy when the same version shows up again.
			const stored = this.memberStash.get(previous)
			if (isSameEntityContent(stored, entity)) return
			this.memberStash.removeItem(previous)
		}
		this.memberHandles.set(key, this.memberStash.addItem(entity))
	}

	/**
	 * Add a relation and wait on every member of interest not seen yet.
	 */
	private addRelationOfInterest(relation: OsmRelation) {
		this.relationIds.add(relation.id)

		const handle = this.relations.add(relation)
		handle.setMembers(countMembersOfInterest(relation, this.memberFilter))
		for (const member of relation.members) {
			if (!this.memberFilter(relation, member)) continue
			if (this.memberHandles.has(memberKey(member.type, member.ref))) {
				handle.decrementMembers()
			} else {
				this.members.track(member.type, member.ref, handle.position)
			}
		}
		if (handle.hasAllMembers()) this.complete(handle)
	}

	/**
	 * Complete every relation the member was the last one missing for. A
	 * failing `onComplete` does not stop the others; the first error is
	 * rethrown once all have been tried.
	 */
	private completeWaiting(type: OsmEntityType, id: number) {
		let firstError: unknown
		let failed = false
		for (const position of this.members.memberFound(type, id)) {
			try {
				this.complete(this.relations.at(position))
			} catch (error) {
				if (!failed) firstError = error
				failed = true
			}
		}
		if (failed) throw firstError
	}

	private complete(handle: RelationHandle) {
		const relation = handle.relation
		this.onComplete(relation, this.resolveMembers(relation))
		this.members.untrack(handle.position)
		handle.remove()
		this.completed++
	}

	private resolveMembers(relation: OsmRelation): ResolvedMember[] {
		const resolved: ResolvedMember[] = []
		for (const member of relation.members) {
			if (!this.memberFilter(relation, member)) continue
			const entity = this.getMember(member.type, member.ref)
			assertValue(
				entity,
				`Member ${memberKey(member.type, member.ref)} not found`,
			)
			resolved.push({ member, entity })
		}
		return resolved
	}
}

/**
 * Manager assembling area relations (multipolygon, boundary, site) from their
 * outer and inner ways.
 */
export function createAreaRelationsManager(
	onComplete: RelationsManagerOptions["onComplete"],
	options: Omit<
		RelationsManagerOptions,
		"onComplete" | "relationFilter" | "memberFilter"
	> = {},
) {
	return new RelationsManager({
		...options,
		relationFilter: isAreaRelation,
		memberFilter: isAreaMember,
		onComplete,
	})
}

/**
 * Manager assembling line relations (routes, waterways, multilinestrings)
 * from their way members.
 */
export function createLineRelationsManager(
	onComplete: RelationsManagerOptions["onComplete"],
	options: Omit<
		RelationsManagerOptions,
		"onComplete" | "relationFilter" | "memberFilter"
	> = {},
) {
	return new RelationsManager({
		...options,
		relationFilter: isLineRelation,
		memberFilter: isLineMember,
		onComplete,
	})
}
