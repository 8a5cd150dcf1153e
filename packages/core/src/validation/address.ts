import { readFileSync } from "node:fs";
import type { FieldErrorEntry } from "../errors/validation-errors.js";
import { ErrorCode } from "./error-codes.js";
import { failure, failWith, type Outcome, success } from "./outcome.js";

export const AddressPart = {
	CITY: 1,
	COUNTRY: 2,
	STREET: 4,
	DISTRICT: 8,
} as const;

export interface AddressRequirements {
	readonly city?: boolean;
	readonly country?: boolean;
	readonly street?: boolean;
	readonly district?: boolean;
}

export const addressMask = (required: AddressRequirements): number =>
	(required.city ? AddressPart.CITY : 0) |
	(required.country ? AddressPart.COUNTRY : 0) |
	(required.street ? AddressPart.STREET : 0) |
	(required.district ? AddressPart.DISTRICT : 0);

let countryCodes: ReadonlySet<string> | undefined;

/**
 * ISO 3166-1 alpha-3 codes, read once from the bundled data file.
 */
export const isoCountryCodes = (): ReadonlySet<string> => {
	if (countryCodes === undefined) {
		const raw: unknown = JSON.parse(
			readFileSync(new URL("../../data/iso3166-alpha3.json", import.meta.url), "utf-8"),
		);
		countryCodes = new Set(
			Array.isArray(raw) ? raw.filter((code): code is string => typeof code === "string") : [],
		);
	}
	return countryCodes;
};

const missing = (code: number): FieldErrorEntry => ({ code, message: "Missing required value" });

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const isMissing = (value: unknown): boolean => value === null || value === undefined;

/**
 * Checks an address record. Every failing part gets its own entry in the
 * returned error map; a country must be an ISO alpha-3 code whenever given.
 */
export const validateAddress = (value: unknown, required: number): Outcome => {
	if (isMissing(value)) return success(null);
	if (!isRecord(value)) {
		return failure(ErrorCode.ADDR_FORMAT, "Invalid format");
	}

	const errors: Record<string, FieldErrorEntry> = {};
	if (required & AddressPart.CITY && isMissing(value.city)) {
		errors.city = missing(ErrorCode.ADDR_MISSING_CITY);
	}
	if (required & AddressPart.COUNTRY && isMissing(value.country)) {
		errors.country = missing(ErrorCode.ADDR_MISSING_COUNTRY);
	}
	const country = value.country;
	if (country && (typeof country !== "string" || !isoCountryCodes().has(country))) {
		errors.country = { code: ErrorCode.ADDR_COUNTRY, message: "Incorrect value" };
	}
	if (required & AddressPart.STREET && isMissing(value.street)) {
		errors.street = missing(ErrorCode.ADDR_MISSING_STREET);
	}
	if (required & AddressPart.DISTRICT && isMissing(value.district)) {
		errors.district = missing(ErrorCode.ADDR_MISSING_DISTRICT);
	}

	return Object.keys(errors).length > 0 ? failWith(errors) : success(value);
};
