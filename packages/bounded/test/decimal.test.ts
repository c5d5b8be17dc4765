import { describe, expect, expectTypeOf, it } from 'vitest'
import { compareExact, isWhole } from '../src/decimal'
import type { CompareDecimal } from '../src/index'

describe('CompareDecimal', () => {
	it('orders integers by sign and length', () => {
		expectTypeOf<CompareDecimal<'-128', '127'>>().toEqualTypeOf<'lt'>()
		expectTypeOf<CompareDecimal<'100', '99'>>().toEqualTypeOf<'gt'>()
		expectTypeOf<CompareDecimal<'0', '0'>>().toEqualTypeOf<'eq'>()
		expectTypeOf<CompareDecimal<'-2', '-10'>>().toEqualTypeOf<'gt'>()
	})

	it('orders numbers wider than a float64 mantissa', () => {
		expectTypeOf<
			CompareDecimal<'18446744073709551615', '9223372036854775807'>
		>().toEqualTypeOf<'gt'>()
		expectTypeOf<
			CompareDecimal<'9223372036854775807', '9223372036854775808'>
		>().toEqualTypeOf<'lt'>()
	})

	it('orders fractions', () => {
		expectTypeOf<CompareDecimal<'10.25', '10.3'>>().toEqualTypeOf<'lt'>()
		expectTypeOf<CompareDecimal<'-10.5', '-10.25'>>().toEqualTypeOf<'lt'>()
		expectTypeOf<CompareDecimal<'1.5', '1'>>().toEqualTypeOf<'gt'>()
	})
})

describe('compareExact', () => {
	it('keeps neighbouring 64-bit values apart', () => {
		expect(compareExact(2n ** 63n - 1n, 2 ** 63)).toBe(-1)
		expect(compareExact(2 ** 63, 2n ** 63n)).toBe(0)
	})

	it('compares across number and bigint', () => {
		expect(compareExact(0.5, 1n)).toBe(-1)
		expect(compareExact(-0.5, -1n)).toBe(1)
		expect(compareExact(3, 3n)).toBe(0)
	})

	it('recognises whole values', () => {
		expect(isWhole(4)).toBe(true)
		expect(isWhole(4n)).toBe(true)
		expect(isWhole(4.5)).toBe(false)
	})
})
