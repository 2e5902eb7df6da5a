export { JsonValidator, type ValidationIssue, type ValidationIssueKind } from './validator.ts';
export { PrettyPrintVisitor } from './pretty.ts';
export { DebugVisitor } from './debug.ts';
export { ArrayTypeChecker, type ArrayElementKind } from './array_types.ts';
