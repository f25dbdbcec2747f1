import type { Entry, SortKey, SortSpec, Track } from "@lsmp3/listing-contract";

export type Ordering = -1 | 0 | 1;

const sign = (value: number): Ordering => (value < 0 ? -1 : value > 0 ? 1 : 0);

export function compareBytes(a: Uint8Array, b: Uint8Array): Ordering {
    return sign(Buffer.compare(a, b));
}

/** Compares strings by their UTF-8 byte sequence. */
export function compareText(a: string, b: string): Ordering {
    if (a === b) {
        return 0;
    }
    return compareBytes(Buffer.from(a, "utf8"), Buffer.from(b, "utf8"));
}

function compareOptionalNumbers(
    a: number | undefined,
    b: number | undefined
): Ordering {
    if (a === undefined || b === undefined) {
        if (a === b) {
            return 0;
        }
        return a === undefined ? -1 : 1;
    }
    return sign(a - b);
}

function compareTracks(a: Track, b: Track): Ordering {
    const byNumber = compareOptionalNumbers(a.number, b.number);
    if (byNumber !== 0) {
        return byNumber;
    }
    return compareOptionalNumbers(a.total, b.total);
}

/**
 * Element-wise comparison of two string lists after lower-casing each
 * element; a list that is a prefix of the other sorts first.
 */
export function compareFolded(
    a: readonly string[],
    b: readonly string[]
): Ordering {
    const shared = Math.min(a.length, b.length);
    for (let index = 0; index < shared; index++) {
        const result = compareText(
            a[index].toLowerCase(),
            b[index].toLowerCase()
        );
        if (result !== 0) {
            return result;
        }
    }
    return sign(a.length - b.length);
}

function compareKey(a: Entry, b: Entry, key: SortKey): Ordering {
    switch (key) {
        case "file-name":
            return compareBytes(a.name, b.name);
        case "file-size":
            return sign(a.size - b.size);
        case "title":
            return compareFolded(
                a.titleSortOrder ?? a.title,
                b.titleSortOrder ?? b.title
            );
        case "artist":
            return compareFolded(
                a.artistSortOrder ?? a.artist,
                b.artistSortOrder ?? b.artist
            );
        case "album":
            return compareFolded(
                a.albumSortOrder ?? a.album,
                b.albumSortOrder ?? b.album
            );
        case "year":
            return compareOptionalNumbers(a.year, b.year);
        case "track":
            return compareTracks(a.track, b.track);
        case "genre":
            return compareFolded(a.genre, b.genre);
    }
}

/**
 * Compares two entries key by key; the first key that tells them apart
 * decides. No keys means equal.
 */
export function compareEntries(
    a: Entry,
    b: Entry,
    keys: readonly SortKey[]
): Ordering {
    for (const key of keys) {
        const result = compareKey(a, b, key);
        if (result !== 0) {
            return result;
        }
    }
    return 0;
}

/** Returns a sorted copy of `entries`; `reverse` flips the whole key chain. */
export function sortEntries(
    entries: readonly Entry[],
    sort: SortSpec
): Entry[] {
    const direction = sort.reverse ? -1 : 1;
    return [...entries].sort(
        (a, b) => direction * compareEntries(a, b, sort.sortBy)
    );
}
