// Public API
export type { Vec3 } from './vec3.js';
export { TOLERANCE } from './vec3.js';

// Shapes
export { SHAPE_KINDS, OPERATIONS, SHAPE_LAYOUTS, isBinary, parseShape } from './shapes.js';
export type {
  ShapeKind, Operation, Dimension, ShapeDescriptor, OperationRequest,
  Shape, PointShape, LineShape, PlaneShape, CircleShape, SphereShape, InvalidShape,
} from './shapes.js';

// Descriptor constructors
export { point, line, plane, circle, sphere, request } from './api.js';

// Results and errors
export { DEGENERATE_REASONS, describeError } from './result.js';
export type {
  Result, DegenerateReason, UnsupportedReason,
  UnsupportedCombination, DegenerateGeometry, MissingEncodingRule, PipelineError,
} from './result.js';

// Compatibility Table + Validator
export { RESULT_KINDS, validate, compatibleShapes, createCompatibilityTable, ruleKey } from './compatibility.js';
export type { CompatibilityRule, CompatibilityTable, ResultKind, RuleMatch, ShapeSignature } from './compatibility.js';

// Geometry Kernel
export { FORMULA_IDS, FORMULAS, compute } from './kernel.js';
export type { FormulaId, FormulaSpec } from './kernel.js';
export type { CalculationResult, CalculationStatus, Step } from './derivation.js';

// Instruction Tables + Encoder
export { resolveInstructionTables, DEFAULT_PRECISION } from './instructions.js';
export type {
  InstructionTable, InstructionTableSource, InstructionTables, Template, TemplateSlot,
} from './instructions.js';
export { encode, formatNumber } from './encoder.js';
export type { KeylogResult } from './encoder.js';

// Tables
export { createTables, TableStore, TableError, compatibilitySchema, instructionTableSchema } from './tables.js';
export type { TableSnapshot, RawTables } from './tables.js';

// Pipeline
export { run, check, PipelineRun } from './pipeline.js';
export type { PipelineResult, PipelineOutput, PipelineState } from './pipeline.js';
