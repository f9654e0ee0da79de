import type {
	OsmRelation,
	OsmRelationMember,
	RelationKind,
} from "./types"

const AREA_TYPES = new Set(["multipolygon", "boundary", "site"])
const LINE_TYPES = new Set(["route", "waterway", "multilinestring", "canal"])

/**
 * Get the semantic kind of a relation based on its type tag.
 * Based on [OSM relation documentation](https://wiki.openstreetmap.org/wiki/Relation):
 * - Areas: multipolygon, boundary, site
 * - Lines: route, waterway, multilinestring, canal
 * - Points: multipoint
 * - Logic: restriction, route_master, network, collection
 * - [Super: relations that contain other relations](https://wiki.openstreetmap.org/wiki/Super-relation)
 */
export function getRelationKind(relation: OsmRelation): RelationKind {
	const typeTag = relation.tags?.["type"]
	const hasRelationMembers = relation.members.some(
		(m) => m.type === "relation",
	)
	if (!typeTag || typeof typeTag !== "string") {
		return hasRelationMembers ? "super" : "logic"
	}

	const normalizedType = typeTag.toLowerCase()
	if (AREA_TYPES.has(normalizedType)) return "area"
	if (LINE_TYPES.has(normalizedType)) return "line"
	if (normalizedType === "multipoint") return "point"
	if (hasRelationMembers) return "super"

	// restriction, route_master, network, collection, etc.
	return "logic"
}

export function isAreaRelation(relation: OsmRelation): boolean {
	return getRelationKind(relation) === "area"
}

export function isLineRelation(relation: OsmRelation): boolean {
	return getRelationKind(relation) === "line"
}

/**
 * Member filter for area assembly: only way members count, and only those
 * with an `outer`, `inner` or empty role.
 */
export function isAreaMember(
	relation: OsmRelation,
	member: OsmRelationMember,
): boolean {
	if (member.type !== "way" || !isAreaRelation(relation)) return false
	const role = member.role?.toLowerCase() ?? ""
	return role === "" || role === "outer" || role === "inner"
}

/**
 * Member filter for line assembly: every way member of a line relation.
 */
export function isLineMember(
	relation: OsmRelation,
	member: OsmRelationMember,
): boolean {
	return member.type === "way" && isLineRelation(relation)
}

/**
 * Count the members a relation would wait on under the given filter.
 */
export function countMembersOfInterest(
	relation: OsmRelation,
	filter: (relation: OsmRelation, member: OsmRelationMember) => boolean,
): number {
	let count = 0
	for (const member of relation.members) {
		if (filter(relation, member)) count++
	}
	return count
}
