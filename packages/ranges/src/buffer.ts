/**
 * Growable storage for 64-bit timestamps.
 */

/**
 * Append-only BigInt64Array that starts at a capacity hint and doubles when
 * full. The hint only affects how often it copies.
 */
export class TimestampBuffer {
	private values: BigInt64Array;
	private length = 0;
	private growths = 0;

	constructor(capacityHint: number) {
		this.values = new BigInt64Array(Math.max(1, Math.floor(capacityHint)));
	}

	get size(): number {
		return this.length;
	}

	get capacity(): number {
		return this.values.length;
	}

	/** Number of times the buffer had to reallocate. */
	get reallocations(): number {
		return this.growths;
	}

	push(value: bigint): void {
		if (this.length === this.values.length) {
			const next = new BigInt64Array(this.values.length * 2);
			next.set(this.values);
			this.values = next;
			this.growths += 1;
		}
		this.values[this.length] = value;
		this.length += 1;
	}

	/**
	 * Copy of the filled part, trimmed to size.
	 */
	toArray(): BigInt64Array {
		return this.values.slice(0, this.length);
	}
}
