import { describe, it, expect } from "vitest";
import {
	DEFAULT_FILE_NAME,
	createValidationContext,
	getSourceName,
	joinUrl,
	normaliseRoot,
	resolveAgainstRoot,
	withContext,
} from "../../src/validation/context.js";
import { ERROR, INFO } from "../../src/types/warning-level.js";

describe("createValidationContext", () => {
	it("applies defaults", () => {
		const context = createValidationContext({ performIoChecks: false, logWarnings: false });

		expect(context.root).toBe(process.cwd());
		expect(context.fileName).toBe(DEFAULT_FILE_NAME);
		expect(context.warningLevel).toBe(ERROR);
		expect(Object.isFrozen(context)).toBe(true);
	});

	it("turns http roots into URLs", () => {
		const context = createValidationContext({ root: "https://example.com/models/unet" });

		expect(context.root).toBeInstanceOf(URL);
	});

	it("derives new contexts without changing the original", () => {
		const context = createValidationContext({ root: "/data" });
		const derived = withContext(context, { warningLevel: INFO });

		expect(derived.warningLevel).toBe(INFO);
		expect(derived.root).toBe("/data");
		expect(context.warningLevel).toBe(ERROR);
	});
});

describe("joinUrl", () => {
	it("keeps the last segment of the base", () => {
		expect(joinUrl(new URL("https://example.com/models/unet"), "weights.pt").href).toBe(
			"https://example.com/models/unet/weights.pt",
		);
	});

	it("drops query and fragment of the base and encodes segments", () => {
		expect(joinUrl(new URL("https://example.com/a/?x=1#top"), "my file.npy").href).toBe(
			"https://example.com/a/my%20file.npy",
		);
	});
});

describe("source names", () => {
	it("joins root and file name", () => {
		expect(getSourceName(createValidationContext({ root: "/data/unet", fileName: "bioimageio.yaml" }))).toBe(
			"/data/unet/bioimageio.yaml",
		);
		expect(getSourceName(createValidationContext({ root: new URL("https://example.com/unet/") }))).toBe(
			"https://example.com/unet/rdf.yaml",
		);
	});

	it("resolves relative paths against directories", () => {
		expect(resolveAgainstRoot("/data/unet", "docs/README.md")).toBe("/data/unet/docs/README.md");
		expect(normaliseRoot("relative/dir")).toBe("relative/dir");
	});
});
