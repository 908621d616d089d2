import { describe, expect, it } from "vitest";
import {
	deriveBaseName,
	matchSuffix,
	outputFileName,
	stagingDirName,
} from "../../src/convert/naming";

describe("matchSuffix", () => {
	it("recognizes .tar.gz by default", () => {
		expect(matchSuffix("notes.tar.gz")).toBe(".tar.gz");
		expect(matchSuffix("notes.tgz")).toBeUndefined();
		expect(matchSuffix("notes.zip")).toBeUndefined();
	});

	it("prefers the longest matching suffix", () => {
		expect(matchSuffix("notes.tar.gz", [".gz", ".tar.gz"])).toBe(".tar.gz");
		expect(matchSuffix("notes.gz", [".gz", ".tar.gz"])).toBe(".gz");
	});

	it("does not match a name that is only the suffix", () => {
		expect(matchSuffix(".tar.gz")).toBeUndefined();
	});

	it("is case sensitive", () => {
		expect(matchSuffix("NOTES.TAR.GZ")).toBeUndefined();
	});
});

describe("deriveBaseName", () => {
	it("strips the recognized suffix", () => {
		expect(deriveBaseName("notes.tar.gz")).toBe("notes");
		expect(deriveBaseName("release-1.2.tgz", [".tgz"])).toBe("release-1.2");
		expect(deriveBaseName("notes.txt")).toBeUndefined();
	});
});

describe("derived names", () => {
	it("names the staging directory and output archive after the base name", () => {
		expect(stagingDirName("notes")).toBe("notes_tmp");
		expect(outputFileName("notes")).toBe("notes.zip");
	});
});
