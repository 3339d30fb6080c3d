import { type Catalog, type ConversionPair, conversionPairs, type TypeName } from './catalog.ts'
import type { FailureSet } from './extract/failure-set.ts'

/**
 * Derived classification of one pair; never stored on its own.
 */
export interface Verdict extends ConversionPair {
	readonly convertible: boolean
}

export interface MatrixRow {
	readonly from: TypeName
	readonly verdicts: readonly Verdict[]
}

export interface MatrixSummary {
	readonly types: number
	readonly pairs: number
	readonly convertible: number
	readonly rejected: number
}

/**
 * Every pair of the catalog's self-product. A pair is convertible exactly
 * when it is absent from the failure set.
 */
export class ConversionMatrix {
	readonly catalog: Catalog
	readonly failures: FailureSet

	constructor(catalog: Catalog, failures: FailureSet) {
		this.catalog = catalog
		this.failures = failures
	}

	isConvertible(from: TypeName, to: TypeName): boolean {
		return !this.failures.has(from, to)
	}

	verdict(pair: ConversionPair): Verdict {
		return { convertible: this.isConvertible(pair.from, pair.to), from: pair.from, to: pair.to }
	}

	/** Rows in catalog order, one verdict per target type. */
	rows(): MatrixRow[] {
		return this.catalog.types.map((from) => ({
			from,
			verdicts: this.catalog.types.map((to) => this.verdict({ from, to })),
		}))
	}

	summary(): MatrixSummary {
		let convertible = 0
		let rejected = 0
		for (const pair of conversionPairs(this.catalog)) {
			if (this.isConvertible(pair.from, pair.to)) {
				convertible++
			} else {
				rejected++
			}
		}
		return {
			convertible,
			pairs: convertible + rejected,
			rejected,
			types: this.catalog.types.length,
		}
	}
}
