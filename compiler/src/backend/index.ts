export { AsmEmitter, emitAsm } from "./asm-emitter.ts";
export { COERCIONS, type Demand, DEMANDS, Typ } from "./representation.ts";
export { LIBC_FUNCTIONS, LIBM_FUNCTIONS, loadPrelude, RUNTIME_HELPERS } from "./runtime.ts";
