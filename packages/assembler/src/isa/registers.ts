/**
 * Register ordinals of the virtual machine.
 * Named registers come first; the positional registers R0-R9 are contiguous.
 */
export const Register = {
	R0: 6,
	R1: 7,
	R2: 8,
	R3: 9,
	R4: 10,
	R5: 11,
	R6: 12,
	R7: 13,
	R8: 14,
	R9: 15,
	Rfl: 3,
	Rfp: 1,
	Rou: 2,
	Rra: 4,
	Rrb: 5,
	Rsp: 0,
} as const

export type Register = (typeof Register)[keyof typeof Register]

const POSITIONAL: readonly Register[] = [
	Register.R0,
	Register.R1,
	Register.R2,
	Register.R3,
	Register.R4,
	Register.R5,
	Register.R6,
	Register.R7,
	Register.R8,
	Register.R9,
]

/**
 * Two-letter register suffixes after `$r`, keyed by first letter then second letter.
 * First letters are tried in this order; a first letter outside the map is not a named register.
 */
export const NAMED_REGISTERS: ReadonlyMap<string, ReadonlyMap<string, Register>> = new Map<string, ReadonlyMap<string, Register>>([
	[
		'f',
		new Map([
			['p', Register.Rfp],
			['l', Register.Rfl],
		]),
	],
	['s', new Map([['p', Register.Rsp]])],
	['o', new Map([['u', Register.Rou]])],
	[
		'r',
		new Map([
			['a', Register.Rra],
			['b', Register.Rrb],
		]),
	],
])

/** `R0 + digit` for a decimal digit 0-9. */
export function positionalRegister(digit: number): Register | undefined {
	return POSITIONAL[digit]
}

const NAMES: ReadonlyMap<Register, string> = new Map([
	...Array.from(NAMED_REGISTERS, ([first, seconds]) =>
		Array.from(seconds, ([second, reg]): [Register, string] => [reg, `r${first}${second}`])
	).flat(),
	...POSITIONAL.map((reg, digit): [Register, string] => [reg, `r${digit}`]),
])

/** Canonical spelling without the `$`, e.g. `rsp` or `r0`. */
export function registerName(register: Register): string {
	const name = NAMES.get(register)
	if (name === undefined) {
		throw new Error(`Invalid register: ${register}`)
	}
	return name
}
