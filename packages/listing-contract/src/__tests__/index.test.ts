import {
    decodeLossy,
    isTrackEmpty,
    normalizeOutputFormat,
    normalizeSortKey,
    toEntryJson,
    type Entry,
} from "../index";

const baseEntry: Entry = {
    name: Buffer.from("a.mp3"),
    size: 12,
    title: [],
    artist: [],
    album: [],
    track: {},
    genre: [],
};

describe("listing contract", () => {
    it("normalizes sort keys and their aliases", () => {
        expect(normalizeSortKey("Artist")).toBe("artist");
        expect(normalizeSortKey(" file-size ")).toBe("file-size");
        expect(normalizeSortKey("filename")).toBe("file-name");
        expect(normalizeSortKey("duration")).toBeNull();
        expect(normalizeSortKey(3)).toBeNull();
    });

    it("normalizes output formats", () => {
        expect(normalizeOutputFormat("JSON")).toBe("json");
        expect(normalizeOutputFormat("table")).toBe("table");
        expect(normalizeOutputFormat("csv")).toBeNull();
    });

    it("treats a track without a number as empty", () => {
        expect(isTrackEmpty({})).toBe(true);
        expect(isTrackEmpty({ total: 9 })).toBe(true);
        expect(isTrackEmpty({ number: 1 })).toBe(false);
    });

    it("serializes single values as strings and drops empty fields", () => {
        expect(
            toEntryJson({
                ...baseEntry,
                title: ["Only"],
                titleSortOrder: ["Only, The"],
                genre: ["Rock", "Pop"],
                track: { total: 9 },
            })
        ).toEqual({
            name: "a.mp3",
            size: 12,
            title: "Only",
            genre: ["Rock", "Pop"],
        });
    });

    it("writes names that are not valid UTF-8 with replacement characters", () => {
        const name = Buffer.from([0x63, 0x61, 0x66, 0xe9, 0x2e, 0x6d, 0x70, 0x33]);

        expect(decodeLossy(name)).toBe("caf\ufffd.mp3");
        expect(toEntryJson({ ...baseEntry, name }).name).toBe("caf\ufffd.mp3");
    });

    it("keeps the track total only when present", () => {
        expect(toEntryJson({ ...baseEntry, track: { number: 3 } }).track).toEqual({
            number: 3,
        });
        expect(
            toEntryJson({ ...baseEntry, year: 0, track: { number: 3, total: 4 } })
        ).toEqual({
            name: "a.mp3",
            size: 12,
            year: 0,
            track: { number: 3, total: 4 },
        });
    });
});
