/**
 * Resizeable typed array utilities.
 *
 * Wraps typed arrays with automatic buffer expansion (ArrayList semantics).
 *
 * @module
 */

/**
 * Typed array types a ResizeableTypedArray can wrap.
 */
export type TypedArray = Uint8Array | Uint16Array | Uint32Array | Float64Array

/**
 * Constructor interface for typed arrays.
 */
export interface TypedArrayConstructor<T extends TypedArray = TypedArray> {
	new (buffer: ArrayBuffer): T
	readonly BYTES_PER_ELEMENT: number
}

/**
 * Uint32Array for storing stash handles and pending member counts.
 *
 * Neither ever exceeds 2^32 - 1, so Uint32Array provides the best balance of
 * range and memory efficiency.
 */
export const IndexArrayType = Uint32Array

/** Largest value a slot in an `IndexArrayType` can hold. */
export const MAX_INDEX_VALUE = 0xffffffff

/**
 * Initial buffer size for ResizeableTypedArray.
 * 64 KiB holds 16K uint32 slots before the first expansion.
 */
export const DEFAULT_BUFFER_SIZE = 2 ** 16

/**
 * Auto-expanding typed array wrapper.
 *
 * - `push()` appends elements, doubling buffer size as needed.
 * - Values already pushed never move between indexes.
 */
export class ResizeableTypedArray<TA extends TypedArray> {
	/** The typed array constructor for this instance */
	ArrayType: TypedArrayConstructor<TA>
	/** The current typed array view into the buffer */
	array: TA
	/** Number of items actually stored (may be less than array.length) */
	items = 0

	/** The underlying buffer */
	buffer: ArrayBuffer
	/** Current buffer size in bytes */
	bufferSize: number

	/**
	 * Create a new ResizeableTypedArray with an empty buffer.
	 *
	 * @param ArrayType - The typed array constructor (e.g., Uint32Array).
	 * @param initialByteLength - Starting buffer size, rounded up to a whole element.
	 */
	constructor(
		ArrayType: TypedArrayConstructor<TA>,
		initialByteLength = DEFAULT_BUFFER_SIZE,
	) {
		this.ArrayType = ArrayType
		const bytes = ArrayType.BYTES_PER_ELEMENT
		this.bufferSize = Math.max(
			bytes,
			Math.ceil(initialByteLength / bytes) * bytes,
		)
		this.buffer = new ArrayBuffer(this.bufferSize)
		this.array = new this.ArrayType(this.buffer)
	}

	/**
	 * Iterate over the stored values.
	 */
	*[Symbol.iterator](): Generator<number> {
		for (let i = 0; i < this.items; i++) yield this.at(i)
	}

	/**
	 * Double the buffer capacity, copying stored values into the new buffer.
	 */
	expandArray() {
		this.bufferSize *= 2
		const newBuffer = new ArrayBuffer(this.bufferSize)
		const newArray = new this.ArrayType(newBuffer)
		newArray.set(this.array)
		this.buffer = newBuffer
		this.array = newArray
	}

	/**
	 * Get the value at an index in `[0, length)`.
	 */
	at(index: number): number {
		if (index < 0 || index >= this.length)
			throw Error(`Index out of bounds: ${index}. Length: ${this.length}`)
		const result = this.array[index]
		if (result === undefined) throw Error(`No value at index: ${index}`)
		return result
	}

	get length() {
		return this.items
	}

	/** Bytes reserved by the buffer, used or not. */
	get byteLength() {
		return this.buffer.byteLength
	}

	/**
	 * Push a value to the end of the array.
	 */
	push(value: number): number {
		if (this.length >= this.array.length) {
			this.expandArray()
		}
		this.array[this.items++] = value
		return this.length - 1
	}

	/**
	 * Overwrite a value at an existing index.
	 */
	set(index: number, value: number) {
		if (index < 0 || index >= this.length)
			throw Error(`Index out of bounds: ${index}. Length: ${this.length}`)
		this.array[index] = value
	}

	/**
	 * Drop every stored value. Capacity is kept.
	 */
	clear() {
		this.items = 0
	}
}
