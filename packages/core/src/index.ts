export * from "./item-stash"
export * from "./members-database"
export * from "./relation-handle"
export * from "./relations-database"
export * from "./relations-manager"
export * from "./typed-arrays"
