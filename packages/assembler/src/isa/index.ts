/**
 * Instruction set lookups used by the tokenizer.
 */

export { buildInstructionTable, instructionCount, lookupOpcode, mnemonicOf } from './instructions.ts'
export { NAMED_REGISTERS, positionalRegister, Register, registerName } from './registers.ts'
