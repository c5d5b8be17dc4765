export {
	defineBounded,
	literal,
	type AcceptInput,
	type BoundedOf,
	type BoundedType,
	type BoundedValue,
	type BoundsGate,
	type ClampedLiteral,
	type ConstBounded,
	type InputCategory,
	type LiteralFactory,
	type NumericInput,
	type Rejected,
	type WholeLiteralGate
} from './bounded'
export { clampInto } from './clamp'
export type { CompareDecimal, Ordering } from './decimal'
export {
	BoundedDefinitionSchema,
	BoundSchema,
	validateDefinition,
	type BoundedDefinition
} from './definition'
export { BoundsError, InputCategoryError, type BoundsErrorCode } from './errors'
export {
	FLOATING_KINDS,
	INTEGRAL_KINDS,
	STORAGE_KINDS,
	type Bound,
	type FloatingKind,
	type InputKind,
	type IntegralKind,
	type NumericCategory,
	type StorageKind,
	type StorageOf
} from './kinds'
export {
	canRepresentBounds,
	categoryOf,
	sameNumericCategory,
	type CanRepresentBounds,
	type CategoryOf,
	type SameNumericCategory
} from './predicates'
export { boundedSchema } from './schema'
export { isScalar, limits, scalar, type AnyScalar, type Scalar } from './scalar'
