/**
 * step-gates module: compiled `if:` predicates for pipeline steps.
 */

export { compileGate, DEFAULT_GATE_SOURCE } from './gate-expression.js'
export type { GateScope } from './gate-expression.js'
