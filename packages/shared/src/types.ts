/**
 * Shared OSM Types
 */

export type OsmEntityType = "node" | "way" | "relation"

export interface OsmInfoParsed {
	version?: number
	timestamp?: number
	changeset?: number
	uid?: number
	user?: string
	visible?: boolean
}

export interface OsmTags {
	[key: string]: string | number
}

export interface IOsmEntity {
	id: number
	info?: OsmInfoParsed
	tags?: OsmTags
}

export interface OsmNode extends IOsmEntity {
	lon: number
	lat: number
}

export interface OsmWay extends IOsmEntity {
	// OSM IDs of the nodes that make up this way
	refs: number[]
}

export interface OsmRelationMember {
	type: OsmEntityType
	ref: number
	role?: string
}

export interface OsmRelation extends IOsmEntity {
	members: OsmRelationMember[]
}

export type OsmEntity = OsmNode | OsmWay | OsmRelation

/**
 * Semantic grouping of relations by their `type` tag.
 */
export type RelationKind = "area" | "line" | "point" | "super" | "logic"
