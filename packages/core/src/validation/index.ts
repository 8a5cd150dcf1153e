export { ErrorCode } from "./error-codes.js";
export type { Outcome } from "./outcome.js";
export { failure, failWith, isOutcome, success } from "./outcome.js";
export {
	escapeHtml,
	parseBool,
	parseDate,
	parseDateToUnixTs,
	parseInteger,
	parseNumber,
	parseObjectId,
	parsePhoneNumber,
	parseUuid,
	removeTags,
	unescapeHtml,
} from "./parsers.js";
export type {
	CoercionKind,
	DateOptions,
	ListItem,
	ListItemValue,
	ListOptions,
	NumberOptions,
	StringOptions,
} from "./validators.js";
export {
	isRequired,
	justFail,
	justPass,
	validateCoercion,
	validateDate,
	validateEmail,
	validateList,
	validateNumber,
	validatePhone,
	validateString,
	validateValueIn,
} from "./validators.js";
export type { ImageContents, ImageType } from "./image.js";
export { ALL_IMAGE_FORMATS, ImageFormat, validateImage } from "./image.js";
export type { AddressRequirements } from "./address.js";
export { AddressPart, addressMask, isoCountryCodes, validateAddress } from "./address.js";
export type { ImageOptions } from "./val.js";
export { isValidatorSpec, runValidator, Val, ValidatorSpec } from "./val.js";
export type {
	FieldKey,
	FieldRule,
	RequiredField,
	ValidationSchema,
	ValidatorFn,
	ValidatorLike,
} from "./schema.js";
export { defineSchema, fieldName, isRequiredKey, requiredField, rule } from "./schema.js";
export type { FieldAccessor, ValidationInput } from "./accessor.js";
export { accessorFor, recordAccessor, valueObjectAccessor } from "./accessor.js";
export { ValidationResult } from "./validation-result.js";
export { validate, validateEffect, validateField } from "./validate.js";
