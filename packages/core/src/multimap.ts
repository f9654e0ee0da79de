export default class MultiMap<K, V> extends Map<K, V[]> {
	add(key: K, value: V) {
		const values = this.get(key)
		if (values) {
			values.push(value)
		} else {
			super.set(key, [value])
		}
	}

	/**
	 * Remove one occurrence of `value` under `key`, dropping the key when it
	 * has no values left.
	 */
	removeValue(key: K, value: V): boolean {
		const values = this.get(key)
		if (!values) return false
		const index = values.indexOf(value)
		if (index === -1) return false
		values.splice(index, 1)
		if (values.length === 0) this.delete(key)
		return true
	}
}
