import { ErrorCode } from "./error-codes.js";
import { failure, type Outcome, success } from "./outcome.js";

// ============================================================================
// Image data URIs
// ============================================================================

export const ImageFormat = {
	PNG: 1,
	JPEG: 2,
	GIF: 4,
} as const;

export const ALL_IMAGE_FORMATS = ImageFormat.PNG | ImageFormat.JPEG | ImageFormat.GIF;

export type ImageType = "png" | "jpeg" | "gif";

export interface ImageContents {
	readonly type: ImageType;
	readonly contents: Uint8Array;
}

const HEADER_LENGTH = 36;
const DATA_PREFIX = "data:image/";
const BASE64_PREFIX = "base64,";
const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

const PNG_HEADER = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const PNG_TRAILER = [0x49, 0x45, 0x4e, 0x44, 0xae, 0x42, 0x60, 0x82];
const JPEG_HEADER = [0xff, 0xd8, 0xff];
const JPEG_TRAILER = [0xff, 0xd9];
const GIF_HEADER = [0x47, 0x49, 0x46, 0x38];
const GIF_TRAILER = [0x00, 0x3b];

const SUBTYPES: Readonly<Record<string, { readonly type: ImageType; readonly format: number }>> = {
	png: { type: "png", format: ImageFormat.PNG },
	jpeg: { type: "jpeg", format: ImageFormat.JPEG },
	jpg: { type: "jpeg", format: ImageFormat.JPEG },
	gif: { type: "gif", format: ImageFormat.GIF },
};

const startsWith = (bytes: Uint8Array, prefix: ReadonlyArray<number>): boolean =>
	bytes.length >= prefix.length && prefix.every((byte, i) => bytes[i] === byte);

const endsWith = (bytes: Uint8Array, suffix: ReadonlyArray<number>): boolean => {
	const offset = bytes.length - suffix.length;
	return offset >= 0 && suffix.every((byte, i) => bytes[offset + i] === byte);
};

const checkPng = (bytes: Uint8Array): boolean =>
	startsWith(bytes, PNG_HEADER) && endsWith(bytes, PNG_TRAILER);

const checkJpeg = (bytes: Uint8Array): boolean => {
	if (!startsWith(bytes, JPEG_HEADER) || !endsWith(bytes, JPEG_TRAILER)) return false;
	const marker = bytes[3];
	return marker !== undefined && marker >= 0xe0 && marker <= 0xe8;
};

const checkGif = (bytes: Uint8Array): boolean =>
	startsWith(bytes, GIF_HEADER) &&
	endsWith(bytes, GIF_TRAILER) &&
	(bytes[4] === 0x37 || bytes[4] === 0x39) &&
	bytes[5] === 0x61;

const CHECKS: { readonly [K in ImageType]: { readonly check: (bytes: Uint8Array) => boolean; readonly code: number; readonly message: string } } = {
	png: { check: checkPng, code: ErrorCode.IMG_PNG, message: "Invalid PNG file" },
	jpeg: { check: checkJpeg, code: ErrorCode.IMG_JPEG, message: "Invalid JPEG file" },
	gif: { check: checkGif, code: ErrorCode.IMG_GIF, message: "Invalid GIF file" },
};

const acceptedFormats = (accepted: number): string =>
	[
		accepted & ImageFormat.PNG ? "PNG" : null,
		accepted & ImageFormat.JPEG ? "JPEG" : null,
		accepted & ImageFormat.GIF ? "GIF" : null,
	]
		.filter((name) => name !== null)
		.join(", ");

const latin1 = new TextDecoder("latin1");

/**
 * Validates a `data:image/<type>;base64,<payload>` URI and checks the decoded
 * bytes against the magic numbers of the declared format.
 */
export const validateImage = (
	value: unknown,
	accepted: number = ALL_IMAGE_FORMATS,
): Outcome<ImageContents | null> => {
	if (value === null || value === undefined || value === "") return success(null);
	const text =
		typeof value === "string" ? value : value instanceof Uint8Array ? latin1.decode(value) : null;
	if (text === null || text.length === 0) return success(null);

	const header = text.slice(0, HEADER_LENGTH);
	if (header.length !== HEADER_LENGTH) {
		return failure(ErrorCode.IMG_CONTENT_TOO_SHORT, "Not valid data contents. Content too short");
	}
	const separator = header.indexOf(";");
	if (!header.startsWith(DATA_PREFIX) || separator === -1) {
		return failure(ErrorCode.IMG_MISSING_HEADER, "Not valid data contents. Expected image data");
	}

	const subtype = SUBTYPES[header.slice(DATA_PREFIX.length, separator)];
	if (subtype === undefined || (subtype.format & accepted) === 0) {
		return failure(
			ErrorCode.IMG_TYPE,
			`Unknown image type. Expected ${acceptedFormats(accepted)}`,
		);
	}
	if (!header.startsWith(BASE64_PREFIX, separator + 1)) {
		return failure(ErrorCode.IMG_CONTENT, "Unknown image type. Expected base64 contents");
	}

	const payload = text.slice(separator + 1 + BASE64_PREFIX.length);
	if (payload.length % 4 !== 0 || !BASE64_RE.test(payload)) {
		return failure(ErrorCode.IMG_CONTENT, "Invalid image contents. Incorrect base64 payload");
	}
	const contents = new Uint8Array(Buffer.from(payload, "base64"));

	const { check, code, message } = CHECKS[subtype.type];
	return check(contents) ? success({ type: subtype.type, contents }) : failure(code, message);
};
