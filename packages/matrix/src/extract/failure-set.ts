import type { ConversionPair, TypeName } from '../catalog.ts'

/**
 * Conversions the compiler rejected. Membership is by exact (from, to).
 * Iterates grouped by source type, in the order types were first added.
 */
export class FailureSet implements Iterable<ConversionPair> {
	private readonly byFrom: Map<TypeName, Set<TypeName>> = new Map()
	private count = 0

	static of(pairs: Iterable<ConversionPair>): FailureSet {
		const set = new FailureSet()
		for (const pair of pairs) {
			set.add(pair)
		}
		return set
	}

	/** Returns false if the pair was already present. */
	add(pair: ConversionPair): boolean {
		let targets = this.byFrom.get(pair.from)
		if (targets === undefined) {
			targets = new Set()
			this.byFrom.set(pair.from, targets)
		}
		if (targets.has(pair.to)) return false
		targets.add(pair.to)
		this.count++
		return true
	}

	has(from: TypeName, to: TypeName): boolean {
		return this.byFrom.get(from)?.has(to) ?? false
	}

	get size(): number {
		return this.count
	}

	*[Symbol.iterator](): Iterator<ConversionPair> {
		for (const [from, targets] of this.byFrom) {
			for (const to of targets) {
				yield { from, to }
			}
		}
	}
}
