import { Data } from "effect";
import { addressMask, type AddressRequirements, validateAddress } from "./address.js";
import { ImageFormat, validateImage } from "./image.js";
import type { Outcome } from "./outcome.js";
import {
	type CoercionKind,
	type DateOptions,
	isRequired,
	justFail,
	justPass,
	type ListItem,
	type ListOptions,
	type NumberOptions,
	type StringOptions,
	validateCoercion,
	validateDate,
	validateEmail,
	validateList,
	validateNumber,
	validatePhone,
	validateString,
	validateValueIn,
} from "./validators.js";

// ============================================================================
// Validator specs
// ============================================================================

/**
 * A validator family together with its bound parameters. Specs are plain
 * immutable data; `runValidator` interprets them.
 */
export type ValidatorSpec = Data.TaggedEnum<{
	Required: {};
	String: { readonly options: StringOptions };
	Email: { readonly domain: string | undefined };
	Phone: { readonly country: string | undefined };
	Date: { readonly options: DateOptions };
	Number: { readonly options: NumberOptions };
	Coerce: { readonly kind: CoercionKind };
	ListOf: { readonly item: ListItem; readonly options: ListOptions };
	ValuesIn: { readonly available: ReadonlyArray<unknown> };
	Address: { readonly required: number };
	Image: { readonly accepted: number };
	JustFail: {};
	JustPass: {};
}>;

export const ValidatorSpec = Data.taggedEnum<ValidatorSpec>();

const SPEC_TAGS: ReadonlySet<string> = new Set<ValidatorSpec["_tag"]>([
	"Required",
	"String",
	"Email",
	"Phone",
	"Date",
	"Number",
	"Coerce",
	"ListOf",
	"ValuesIn",
	"Address",
	"Image",
	"JustFail",
	"JustPass",
]);

export const isValidatorSpec = (value: unknown): value is ValidatorSpec =>
	typeof value === "object" &&
	value !== null &&
	"_tag" in value &&
	typeof value._tag === "string" &&
	SPEC_TAGS.has(value._tag);

export const runValidator = (spec: ValidatorSpec, value: unknown): Outcome => {
	switch (spec._tag) {
		case "Required":
			return isRequired(value);
		case "String":
			return validateString(value, spec.options);
		case "Email":
			return validateEmail(value, spec.domain);
		case "Phone":
			return validatePhone(value, spec.country);
		case "Date":
			return validateDate(value, spec.options);
		case "Number":
			return validateNumber(value, spec.options);
		case "Coerce":
			return validateCoercion(value, spec.kind);
		case "ListOf":
			return validateList(value, spec.item, spec.options);
		case "ValuesIn":
			return validateValueIn(value, spec.available);
		case "Address":
			return validateAddress(value, spec.required);
		case "Image":
			return validateImage(value, spec.accepted);
		case "JustFail":
			return justFail(value);
		case "JustPass":
			return justPass(value);
	}
};

// ============================================================================
// Val constructors
// ============================================================================

export interface ImageOptions {
	readonly png?: boolean;
	readonly jpeg?: boolean;
	readonly gif?: boolean;
}

/**
 * Constructors for every validator family.
 *
 * @example
 * ```ts
 * const schema = defineSchema({
 *   email: [Val.required(), Val.email({ domain: "example.com" })],
 *   age: [Val.number({ integer: true, min: 18 })],
 * })
 * ```
 */
export const Val = {
	required: (): ValidatorSpec => ValidatorSpec.Required(),
	string: (options: StringOptions = {}): ValidatorSpec => ValidatorSpec.String({ options }),
	email: (options: { readonly domain?: string } = {}): ValidatorSpec =>
		ValidatorSpec.Email({ domain: options.domain }),
	phone: (options: { readonly country?: string } = {}): ValidatorSpec =>
		ValidatorSpec.Phone({ country: options.country }),
	date: (options: DateOptions = {}): ValidatorSpec => ValidatorSpec.Date({ options }),
	number: (options: NumberOptions = {}): ValidatorSpec => ValidatorSpec.Number({ options }),
	uuid: (): ValidatorSpec => ValidatorSpec.Coerce({ kind: "uuid" }),
	objectId: (): ValidatorSpec => ValidatorSpec.Coerce({ kind: "objectId" }),
	boolean: (): ValidatorSpec => ValidatorSpec.Coerce({ kind: "boolean" }),
	listOfUuid: (options: ListOptions = {}): ValidatorSpec =>
		ValidatorSpec.ListOf({ item: { kind: "uuid" }, options }),
	listOfObjectId: (options: ListOptions = {}): ValidatorSpec =>
		ValidatorSpec.ListOf({ item: { kind: "objectId" }, options }),
	listOfNumbers: (options: ListOptions & { readonly integer?: boolean } = {}): ValidatorSpec =>
		ValidatorSpec.ListOf({
			item: { kind: "number", integer: options.integer ?? false },
			options: { minLength: options.minLength, maxLength: options.maxLength },
		}),
	listOfDates: (options: ListOptions = {}): ValidatorSpec =>
		ValidatorSpec.ListOf({ item: { kind: "date" }, options }),
	listOfStrings: (available: ReadonlyArray<string>, options: ListOptions = {}): ValidatorSpec =>
		ValidatorSpec.ListOf({ item: { kind: "stringIn", available }, options }),
	valuesIn: (available: ReadonlyArray<unknown>): ValidatorSpec =>
		ValidatorSpec.ValuesIn({ available }),
	address: (required: AddressRequirements = {}): ValidatorSpec =>
		ValidatorSpec.Address({ required: addressMask(required) }),
	image: (options: ImageOptions = {}): ValidatorSpec => {
		const { png = true, jpeg = true, gif = true } = options;
		const accepted =
			(png ? ImageFormat.PNG : 0) | (jpeg ? ImageFormat.JPEG : 0) | (gif ? ImageFormat.GIF : 0);
		return ValidatorSpec.Image({ accepted });
	},
	justFail: (): ValidatorSpec => ValidatorSpec.JustFail(),
	justPass: (): ValidatorSpec => ValidatorSpec.JustPass(),
} as const;
