/**
 * Mnemonic to opcode table of the instruction set.
 * Loaded once from instructions.json next to this module.
 */

import { readFileSync } from 'node:fs'

const MNEMONIC = /^[a-z]+$/

function isOpcode(value: unknown): value is number {
	return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 0xff
}

/**
 * Validates the raw table: letters-only lowercase mnemonics, unique byte opcodes.
 * A mnemonic with digits or `_` could never be reached by the tokenizer's identifier run.
 */
export function buildInstructionTable(raw: unknown): ReadonlyMap<string, number> {
	if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
		throw new Error('Instruction table must be an object of mnemonic to opcode')
	}

	const table = new Map<string, number>()
	const seen = new Set<number>()
	for (const [mnemonic, opcode] of Object.entries(raw)) {
		if (!MNEMONIC.test(mnemonic)) {
			throw new Error(`Invalid mnemonic "${mnemonic}": only lowercase letters are allowed`)
		}
		if (!isOpcode(opcode)) {
			throw new Error(`Invalid opcode for "${mnemonic}": ${String(opcode)}`)
		}
		if (seen.has(opcode)) {
			throw new Error(`Duplicate opcode ${opcode} for "${mnemonic}"`)
		}
		seen.add(opcode)
		table.set(mnemonic, opcode)
	}
	return table
}

const TABLE_URL = new URL('./instructions.json', import.meta.url)

const INSTRUCTIONS = buildInstructionTable(JSON.parse(readFileSync(TABLE_URL, 'utf-8')))

const MNEMONICS: ReadonlyMap<number, string> = new Map(
	Array.from(INSTRUCTIONS, ([mnemonic, opcode]) => [opcode, mnemonic])
)

export function lookupOpcode(mnemonic: string): number | undefined {
	return INSTRUCTIONS.get(mnemonic)
}

export function mnemonicOf(opcode: number): string | undefined {
	return MNEMONICS.get(opcode)
}

export function instructionCount(): number {
	return INSTRUCTIONS.size
}
