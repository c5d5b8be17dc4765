import { describe, expect, expectTypeOf, it } from 'vitest'
import {
	canRepresentBounds,
	categoryOf,
	sameNumericCategory,
	type CanRepresentBounds,
	type CategoryOf,
	type SameNumericCategory
} from '../src/index'

describe('CanRepresentBounds', () => {
	it('accepts bounds inside the kind range', () => {
		expectTypeOf<CanRepresentBounds<'uint8', 0, 255>>().toEqualTypeOf<true>()
		expectTypeOf<CanRepresentBounds<'int8', -128, 127>>().toEqualTypeOf<true>()
		expectTypeOf<
			CanRepresentBounds<
				'int64',
				-9223372036854775808n,
				9223372036854775807n
			>
		>().toEqualTypeOf<true>()
	})

	it('rejects bounds outside the kind range', () => {
		expectTypeOf<CanRepresentBounds<'uint8', -128, 127>>().toEqualTypeOf<false>()
		expectTypeOf<
			CanRepresentBounds<'int64', 0n, 9223372036854775808n>
		>().toEqualTypeOf<false>()
	})

	it('requires ordered bounds', () => {
		expectTypeOf<CanRepresentBounds<'int32', 1000, 0>>().toEqualTypeOf<false>()
		expectTypeOf<CanRepresentBounds<'int32', 5, 5>>().toEqualTypeOf<true>()
		expectTypeOf<
			CanRepresentBounds<'float64', -10.25, -10.5>
		>().toEqualTypeOf<false>()
	})

	it('rejects fractional bounds for integral kinds', () => {
		expectTypeOf<CanRepresentBounds<'int32', 0, 10.5>>().toEqualTypeOf<false>()
		expectTypeOf<CanRepresentBounds<'bigint', 0, 0.5>>().toEqualTypeOf<false>()
	})

	it('checks float exactness for whole bounds', () => {
		expectTypeOf<CanRepresentBounds<'float64', -100, 0>>().toEqualTypeOf<true>()
		expectTypeOf<
			CanRepresentBounds<'float64', 0n, 9007199254740993n>
		>().toEqualTypeOf<false>()
		expectTypeOf<CanRepresentBounds<'float32', -1.5, 1.5>>().toEqualTypeOf<true>()
		expectTypeOf<
			CanRepresentBounds<'float32', 0, 16777217>
		>().toEqualTypeOf<false>()
	})

	it('only takes literal bounds', () => {
		expectTypeOf<CanRepresentBounds<'int32', number, 10>>().toEqualTypeOf<false>()
		expectTypeOf<CanRepresentBounds<'int32', 0 | 1, 10>>().toEqualTypeOf<false>()
		expectTypeOf<CanRepresentBounds<'text', 0, 10>>().toEqualTypeOf<false>()
	})
})

describe('canRepresentBounds', () => {
	it('matches the type-level answers', () => {
		expect(canRepresentBounds('uint8', 0, 255)).toBe(true)
		expect(canRepresentBounds('uint8', -128, 127)).toBe(false)
		expect(canRepresentBounds('int8', -128, 127)).toBe(true)
		expect(canRepresentBounds('int32', 1000, 0)).toBe(false)
		expect(canRepresentBounds('int32', 5, 5)).toBe(true)
		expect(canRepresentBounds('int32', 0, 10.5)).toBe(false)
		expect(canRepresentBounds('int64', -(2n ** 63n), 2n ** 63n - 1n)).toBe(true)
		expect(canRepresentBounds('int64', 0n, 2n ** 63n)).toBe(false)
		expect(canRepresentBounds('float64', -100, 0)).toBe(true)
		expect(canRepresentBounds('float64', 0n, 9007199254740993n)).toBe(false)
		expect(canRepresentBounds('float32', -1.5, 1.5)).toBe(true)
		expect(canRepresentBounds('float32', 0, 16777217)).toBe(false)
	})

	it('checks float32 range and fractions', () => {
		expect(canRepresentBounds('float32', 0, 0.1)).toBe(true)
		expect(canRepresentBounds('float32', 0, 1e39)).toBe(false)
	})

	it('treats bigint as unbounded and number as float64', () => {
		expect(canRepresentBounds('bigint', -5, 5)).toBe(true)
		expect(canRepresentBounds('bigint', 0, 0.5)).toBe(false)
		expect(canRepresentBounds('number', 0, 2n ** 63n)).toBe(true)
	})

	it('rejects bounds past the end of a 64-bit kind', () => {
		expect(canRepresentBounds('uint64', 0, 2 ** 64)).toBe(false)
		expect(canRepresentBounds('uint64', 0, 2 ** 63)).toBe(true)
	})

	it('answers false for non-finite bounds', () => {
		expect(canRepresentBounds('float64', 0, Infinity)).toBe(false)
		expect(canRepresentBounds('float64', Number.NaN, 0)).toBe(false)
	})
})

describe('numeric category', () => {
	it('groups kinds at the type level', () => {
		expectTypeOf<CategoryOf<'uint16'>>().toEqualTypeOf<'integral'>()
		expectTypeOf<CategoryOf<'bigint'>>().toEqualTypeOf<'integral'>()
		expectTypeOf<CategoryOf<'float32'>>().toEqualTypeOf<'floating'>()
		expectTypeOf<CategoryOf<'number'>>().toEqualTypeOf<'floating'>()
		expectTypeOf<CategoryOf<'text'>>().toEqualTypeOf<never>()
	})

	it('compares categories at the type level', () => {
		expectTypeOf<SameNumericCategory<'int8', 'uint64'>>().toEqualTypeOf<true>()
		expectTypeOf<SameNumericCategory<'bigint', 'int16'>>().toEqualTypeOf<true>()
		expectTypeOf<SameNumericCategory<'float64', 'number'>>().toEqualTypeOf<true>()
		expectTypeOf<SameNumericCategory<'integral', 'int8'>>().toEqualTypeOf<true>()
		expectTypeOf<SameNumericCategory<'int8', 'float32'>>().toEqualTypeOf<false>()
		expectTypeOf<SameNumericCategory<'text', 'text'>>().toEqualTypeOf<false>()
	})

	it('compares categories at run time', () => {
		expect(categoryOf('uint32')).toBe('integral')
		expect(categoryOf('number')).toBe('floating')
		expect(sameNumericCategory('int8', 'bigint')).toBe(true)
		expect(sameNumericCategory('float32', 'number')).toBe(true)
		expect(sameNumericCategory('uint8', 'float64')).toBe(false)
	})
})
