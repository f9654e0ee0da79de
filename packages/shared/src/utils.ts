/**
 * Entity discrimination, comparison and member keys.
 *
 * @module
 */

import { dequal } from "dequal/lite"
import type {
	OsmEntity,
	OsmEntityType,
	OsmNode,
	OsmRelation,
	OsmWay,
} from "./types"

export function isNode(entity: OsmEntity): entity is OsmNode {
	return "lon" in entity && "lat" in entity
}

export function isWay(entity: OsmEntity): entity is OsmWay {
	return "refs" in entity
}

export function isRelation(entity: OsmEntity): entity is OsmRelation {
	return "members" in entity
}

export function getEntityType(entity: OsmEntity): OsmEntityType {
	if (isNode(entity)) return "node"
	if (isWay(entity)) return "way"
	if (isRelation(entity)) return "relation"
	throw Error("Unknown entity type")
}

/** Coordinates of a node, refs of a way, members of a relation. */
function contentOf(entity: OsmEntity): unknown {
	if (isNode(entity)) return [entity.lon, entity.lat]
	if (isWay(entity)) return entity.refs
	return entity.members
}

/**
 * Whether two entities of the same type carry the same content, tags and
 * info. Ids are not compared.
 */
export function isSameEntityContent(a: OsmEntity, b: OsmEntity): boolean {
	if (getEntityType(a) !== getEntityType(b)) return false
	return (
		dequal(contentOf(a), contentOf(b)) &&
		dequal(a.tags, b.tags) &&
		dequal(a.info, b.info)
	)
}

/**
 * Key identifying a member across entity types, e.g. `way/42`.
 */
export function memberKey(type: OsmEntityType, ref: number): string {
	return `${type}/${ref}`
}
