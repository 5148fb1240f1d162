import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { configFromEnv, defaultConfig, loadConfig, parseConfig } from "../src/config.js";
import { MetaIRError } from "../src/errors.js";

describe("parseConfig", () => {
	it("fills in defaults", () => {
		const result = parseConfig({});
		assert.equal(result.valid, true);
		if (!result.valid) return;
		assert.deepEqual(result.value, {
			logLevel: "warn",
			verbose: false,
			verifyTerminatorPosition: false,
		});
	});

	it("keeps given values", () => {
		const result = parseConfig({ logLevel: "debug", verbose: true, verifyTerminatorPosition: true });
		assert.equal(result.valid, true);
		if (!result.valid) return;
		assert.equal(result.value.logLevel, "debug");
		assert.equal(result.value.verbose, true);
		assert.equal(result.value.verifyTerminatorPosition, true);
	});

	it("reports the path of a bad field", () => {
		const result = parseConfig({ logLevel: "loud" });
		assert.equal(result.valid, false);
		assert.deepEqual(result.errors.map((e) => e.path), ["logLevel"]);
	});

	it("rejects a non-object", () => {
		const result = parseConfig("verbose");
		assert.equal(result.valid, false);
		assert.equal(result.errors[0]?.path, "$");
	});
});

describe("loadConfig", () => {
	it("returns the defaults for no input", () => {
		assert.deepEqual(loadConfig(), defaultConfig);
	});

	it("throws a ValidationError on bad input", () => {
		assert.throws(
			() => loadConfig({ verbose: "sometimes" }),
			(err: unknown) => err instanceof MetaIRError && err.code === "ValidationError",
		);
	});
});

describe("configFromEnv", () => {
	it("reads every variable", () => {
		const result = configFromEnv({
			METAIR_LOG_LEVEL: "info",
			METAIR_VERBOSE: "yes",
			METAIR_VERIFY_TERMINATORS: "0",
		});
		assert.equal(result.valid, true);
		if (!result.valid) return;
		assert.deepEqual(result.value, {
			logLevel: "info",
			verbose: true,
			verifyTerminatorPosition: false,
		});
	});

	it("uses defaults for unset variables", () => {
		const result = configFromEnv({});
		assert.equal(result.valid, true);
		if (!result.valid) return;
		assert.deepEqual(result.value, defaultConfig);
	});

	it("accepts flags regardless of case and padding", () => {
		const result = configFromEnv({ METAIR_VERBOSE: " TRUE " });
		assert.equal(result.valid, true);
		if (!result.valid) return;
		assert.equal(result.value.verbose, true);
	});

	it("reports an unrecognised flag against its key", () => {
		const result = configFromEnv({ METAIR_VERIFY_TERMINATORS: "maybe" });
		assert.equal(result.valid, false);
		assert.deepEqual(result.errors.map((e) => e.path), ["verifyTerminatorPosition"]);
	});
});
