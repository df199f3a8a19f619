/**
 * @lode/ast-json - JSON representation of the Lode syntax tree
 */
export { encodeDeclaration, encodeExpression, encodeProgram, encodeStatement, encodeStaticType } from "./encode.js";
export { decodeProgram, formatJsonPath, parseProgram } from "./decode.js";
export type { DecodeResult } from "./decode.js";
export { declarationSchema, expressionSchema, positionSchema, programSchema, statementSchema, staticTypeSchema } from "./schemas.js";
export type * from "./schemas.js";
export * from "./names.js";
