import { isEnvFlagEnabled, parseEnvCsv } from "../envParsers";

describe("envParsers", () => {
    it("parses comma separated values", () => {
        expect(parseEnvCsv("artist, album ,,title")).toEqual([
            "artist",
            "album",
            "title",
        ]);
        expect(parseEnvCsv(" , ")).toBeUndefined();
        expect(parseEnvCsv(undefined)).toBeUndefined();
    });

    it("accepts true and 1 as enabled flags", () => {
        expect(isEnvFlagEnabled("true")).toBe(true);
        expect(isEnvFlagEnabled("1")).toBe(true);
        expect(isEnvFlagEnabled("yes")).toBe(false);
        expect(isEnvFlagEnabled(undefined)).toBe(false);
    });
});
