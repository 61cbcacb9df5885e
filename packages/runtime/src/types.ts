/**
 * Value types seen by staged intrinsics code.
 *
 * Register types are opaque: staged code only moves them between intrinsics.
 * Integer widths share the JavaScript carrier of their range (number or bigint);
 * the C spelling lives on the Typ descriptor.
 */

export interface __m64 {
	readonly register: '__m64'
}
export interface __m128 {
	readonly register: '__m128'
}
export interface __m128d {
	readonly register: '__m128d'
}
export interface __m128i {
	readonly register: '__m128i'
}
export interface __m256 {
	readonly register: '__m256'
}
export interface __m256d {
	readonly register: '__m256d'
}
export interface __m256i {
	readonly register: '__m256i'
}
export interface __m512 {
	readonly register: '__m512'
}
export interface __m512d {
	readonly register: '__m512d'
}
export interface __m512i {
	readonly register: '__m512i'
}

export type Unit = void
export type Byte = number
export type Short = number
export type Int = number
export type Long = bigint
export type UByte = number
export type UShort = number
export type UInt = number
export type ULong = bigint
export type Float = number
export type Double = number
export type Any = unknown

export interface VoidPointer {
	readonly pointee: 'void'
}

export interface DoubleVoidPointer {
	readonly pointee: 'void*'
}

/**
 * Types usable as array offsets.
 */
export type Integral = Byte | Short | Int | Long | UByte | UShort | UInt | ULong

/**
 * Runtime descriptor of a staged type.
 * The phantom field ties the descriptor to its static type without storing a value.
 */
export interface Typ<T> {
	readonly name: string
	readonly cType: string
	readonly __type?: T
}

export function typ<T>(name: string, cType: string): Typ<T> {
	return { cType, name }
}

/**
 * Descriptor of a pointer to `element`, whatever container backs it.
 */
export function pointerTyp<P, T>(element: Typ<T>): Typ<P> {
	return { cType: `${element.cType}*`, name: `Array[${element.name}]` }
}

export const Typs = {
	__m128: typ<__m128>('__m128', '__m128'),
	__m128d: typ<__m128d>('__m128d', '__m128d'),
	__m128i: typ<__m128i>('__m128i', '__m128i'),
	__m256: typ<__m256>('__m256', '__m256'),
	__m256d: typ<__m256d>('__m256d', '__m256d'),
	__m256i: typ<__m256i>('__m256i', '__m256i'),
	__m512: typ<__m512>('__m512', '__m512'),
	__m512d: typ<__m512d>('__m512d', '__m512d'),
	__m512i: typ<__m512i>('__m512i', '__m512i'),
	__m64: typ<__m64>('__m64', '__m64'),
	Any: typ<Any>('Any', 'void'),
	Byte: typ<Byte>('Byte', 'int8_t'),
	Double: typ<Double>('Double', 'double'),
	DoubleVoidPointer: typ<DoubleVoidPointer>('DoubleVoidPointer', 'void**'),
	Float: typ<Float>('Float', 'float'),
	Int: typ<Int>('Int', 'int32_t'),
	Long: typ<Long>('Long', 'int64_t'),
	Short: typ<Short>('Short', 'int16_t'),
	UByte: typ<UByte>('UByte', 'uint8_t'),
	UInt: typ<UInt>('UInt', 'uint32_t'),
	ULong: typ<ULong>('ULong', 'uint64_t'),
	Unit: typ<Unit>('Unit', 'void'),
	UShort: typ<UShort>('UShort', 'uint16_t'),
	VoidPointer: typ<VoidPointer>('VoidPointer', 'void*'),
} as const

/**
 * C spelling of a staged type.
 */
export function remap(t: Typ<unknown>): string {
	return t.cType
}
