// Raw order as produced by the order generator. `orderTime` is a local
// date-time without zone; the job configuration says which UTC offset it is in.
export type Order = {
	type: number
	price: number
	orderTime: string
}

// Reference average price per order type
export type TypeStat = {
	type: number
	avgPrice: number
}

// Result of joining a per-window order count with the type's average price
export type TypeCountWithPrice = {
	type: number
	theCount: number
	avgPrice: number
}
