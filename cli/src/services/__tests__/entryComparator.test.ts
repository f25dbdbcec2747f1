import type { Entry, SortKey, SortSpec } from "@lsmp3/listing-contract";
import {
    compareBytes,
    compareEntries,
    compareFolded,
    compareText,
    sortEntries,
} from "../entryComparator";

type EntryOverrides = Partial<Omit<Entry, "name">> & { name?: string | Buffer };

function makeEntry(overrides: EntryOverrides = {}): Entry {
    const { name = "track.mp3", ...rest } = overrides;
    return {
        name: typeof name === "string" ? Buffer.from(name) : name,
        size: 100,
        title: [],
        artist: [],
        album: [],
        track: {},
        genre: [],
        ...rest,
    };
}

const names = (entries: readonly Entry[]) =>
    entries.map((entry) => entry.name.toString("latin1"));

describe("entryComparator", () => {
    describe("compareText", () => {
        it("orders by UTF-8 bytes rather than UTF-16 code units", () => {
            // U+FF5E is 0xEF 0xBD 0x9E, U+1F600 is 0xF0 ...; UTF-16 would order them the other way
            expect(compareText("～", "\u{1F600}")).toBe(-1);
            expect(compareText("\u{1F600}", "～")).toBe(1);
        });

        it("does not fold case", () => {
            expect(compareText("B.mp3", "a.mp3")).toBe(-1);
            expect(compareText("same", "same")).toBe(0);
        });
    });

    describe("compareBytes", () => {
        it("compares raw bytes that are not valid UTF-8", () => {
            expect(compareBytes(Buffer.from([0x63, 0xe9]), Buffer.from("ce"))).toBe(1);
            expect(compareBytes(Buffer.from([0xff]), Buffer.from([0xff]))).toBe(0);
        });
    });

    describe("compareFolded", () => {
        it("ignores case element by element", () => {
            expect(compareFolded(["adele"], ["ADELE"])).toBe(0);
            expect(compareFolded(["Abba", "b"], ["abba", "C"])).toBe(-1);
        });

        it("sorts a prefix before the longer list", () => {
            expect(compareFolded([], ["a"])).toBe(-1);
            expect(compareFolded(["a", "b"], ["a"])).toBe(1);
        });
    });

    describe("compareEntries", () => {
        it("treats differently cased artists as equal", () => {
            const a = makeEntry({ artist: ["adele"] });
            const b = makeEntry({ artist: ["ADELE"] });

            expect(compareEntries(a, b, ["artist"])).toBe(0);
        });

        it("uses the sort order override in place of the title", () => {
            const overridden = makeEntry({ title: ["B"], titleSortOrder: ["A"] });
            const plain = makeEntry({ title: ["A"] });

            expect(compareEntries(overridden, plain, ["title"])).toBe(0);
            const lower = makeEntry({ title: ["Z"], titleSortOrder: ["0"] });
            expect(compareEntries(lower, plain, ["title"])).toBe(-1);
        });

        it("uses artist and album overrides", () => {
            const theBeatles = makeEntry({
                artist: ["The Beatles"],
                artistSortOrder: ["Beatles, The"],
                album: ["The White Album"],
                albumSortOrder: ["White Album"],
            });
            const queen = makeEntry({ artist: ["Queen"], album: ["Jazz"] });

            expect(compareEntries(theBeatles, queen, ["artist"])).toBe(-1);
            expect(compareEntries(theBeatles, queen, ["album"])).toBe(1);
        });

        it("sorts absent years and track parts first", () => {
            const none = makeEntry();
            const year = makeEntry({ year: 1999 });
            const numberOnly = makeEntry({ track: { number: 2 } });
            const numberAndTotal = makeEntry({ track: { number: 2, total: 10 } });
            const totalOnly = makeEntry({ track: { total: 10 } });

            expect(compareEntries(none, year, ["year"])).toBe(-1);
            expect(compareEntries(numberOnly, numberAndTotal, ["track"])).toBe(-1);
            expect(compareEntries(totalOnly, numberOnly, ["track"])).toBe(-1);
            expect(compareEntries(none, totalOnly, ["track"])).toBe(-1);
        });

        it("falls through to the next key on ties and stops at the first difference", () => {
            const a = makeEntry({ name: "b.mp3", album: ["Same"], size: 1 });
            const b = makeEntry({ name: "a.mp3", album: ["same"], size: 2 });

            expect(compareEntries(a, b, ["album", "file-name"])).toBe(1);
            expect(compareEntries(a, b, ["album", "file-size", "file-name"])).toBe(-1);
        });

        it("sorts file names by their raw bytes", () => {
            const latin1Name = Buffer.from([0x63, 0x61, 0x66, 0xe9]);
            const latin1 = makeEntry({ name: latin1Name });
            const ascii = makeEntry({ name: "cafz" });

            expect(compareEntries(ascii, latin1, ["file-name"])).toBe(-1);
            expect(
                compareEntries(latin1, makeEntry({ name: Buffer.from(latin1Name) }), [
                    "file-name",
                ])
            ).toBe(0);
        });

        it("returns equal for an empty key list", () => {
            expect(
                compareEntries(makeEntry({ name: "a" }), makeEntry({ name: "b" }), [])
            ).toBe(0);
        });

        it("behaves as a strict weak ordering", () => {
            const entries = [
                makeEntry({ name: "1", artist: ["b"], year: 2001 }),
                makeEntry({ name: "2", artist: ["B"], year: 2000 }),
                makeEntry({ name: "3", artist: ["a"] }),
                makeEntry({ name: "4", artist: [], year: 2000 }),
                makeEntry({ name: "5", artist: ["a", "b"], year: 2000 }),
            ];
            const keys: SortKey[] = ["artist", "year"];

            for (const a of entries) {
                expect(compareEntries(a, a, keys)).toBe(0);
                for (const b of entries) {
                    expect(compareEntries(a, b, keys)).toBe(
                        -compareEntries(b, a, keys) || 0
                    );
                    for (const c of entries) {
                        if (
                            compareEntries(a, b, keys) <= 0 &&
                            compareEntries(b, c, keys) <= 0
                        ) {
                            expect(compareEntries(a, c, keys)).toBeLessThanOrEqual(0);
                        }
                    }
                }
            }
        });
    });

    describe("sortEntries", () => {
        const entries = [
            makeEntry({ name: "c.mp3", genre: ["Rock"] }),
            makeEntry({ name: "a.mp3", genre: ["pop"] }),
            makeEntry({ name: "b.mp3", genre: ["Pop"] }),
        ];

        it("returns a sorted copy", () => {
            const sorted = sortEntries(entries, {
                sortBy: ["file-name"],
                reverse: false,
            });

            expect(names(sorted)).toEqual(["a.mp3", "b.mp3", "c.mp3"]);
            expect(names(entries)).toEqual(["c.mp3", "a.mp3", "b.mp3"]);
        });

        it("is idempotent", () => {
            const sort: SortSpec = { sortBy: ["genre"], reverse: false };
            const once = sortEntries(entries, sort);
            const twice = sortEntries(once, sort);

            expect(names(twice)).toEqual(names(once));
            expect(names(once)).toEqual(["a.mp3", "b.mp3", "c.mp3"]);
        });

        it("reverses the ascending file name order exactly", () => {
            const ascending = sortEntries(entries, {
                sortBy: ["file-name"],
                reverse: false,
            });
            const descending = sortEntries(entries, {
                sortBy: ["file-name"],
                reverse: true,
            });

            expect(names(descending)).toEqual([...names(ascending)].reverse());
        });
    });
});
