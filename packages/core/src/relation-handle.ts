import { assert } from "@osm-relations/shared/assert"
import type { OsmRelation } from "@osm-relations/shared/types"
import type { RelationsDatabase } from "./relations-database"
import { MAX_INDEX_VALUE } from "./typed-arrays"

/**
 * A RelationHandle is used to access slots in a RelationsDatabase.
 *
 * Handles are handed out by the database (`add`, `at`, `get`, iteration) and
 * are cheap: any number of them may point at the same position. The position
 * alone is smaller than a handle, so indexes store it and turn it back into a
 * handle with `database.at(position)`.
 *
 * Once the relation is removed, every handle to it is dead: all operations
 * except `position`, `database`, `isValid()` and `equals()` throw.
 */
export class RelationHandle {
	/** @internal */
	constructor(
		readonly database: RelationsDatabase,
		readonly position: number,
	) {}

	/**
	 * The relation stored in the database. Changes made to it are kept.
	 */
	get relation(): OsmRelation {
		return this.database.getRelation(this.position)
	}

	get(): OsmRelation {
		return this.relation
	}

	/** Number of members still missing. */
	get members(): number {
		return this.database.getMembers(this.position)
	}

	/**
	 * Set the number of relation members that we want to track.
	 */
	setMembers(value: number) {
		this.database.setMembers(this.position, value)
	}

	incrementMembers() {
		const members = this.members
		assert(
			members < MAX_INDEX_VALUE,
			`Member count overflow for relation at position ${this.position}`,
		)
		this.database.setMembers(this.position, members + 1)
	}

	/**
	 * Count one tracked member as found. The relation must still be missing
	 * at least one member.
	 */
	decrementMembers() {
		const members = this.members
		assert(
			members > 0,
			`Relation at position ${this.position} has no pending members`,
		)
		this.database.setMembers(this.position, members - 1)
	}

	/**
	 * Do we have all members? True when no tracked member is missing.
	 */
	hasAllMembers(): boolean {
		return this.members === 0
	}

	/**
	 * Remove the relation from the database. All handles to it become invalid.
	 */
	remove() {
		this.database.remove(this.position)
	}

	isValid(): boolean {
		return this.database.isValid(this.position)
	}

	equals(other: RelationHandle): boolean {
		return this.database === other.database && this.position === other.position
	}
}
