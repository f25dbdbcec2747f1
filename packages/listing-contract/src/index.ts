export const SORT_KEY_VALUES = [
    "file-name",
    "file-size",
    "title",
    "artist",
    "album",
    "year",
    "track",
    "genre",
] as const;

export type SortKey = (typeof SORT_KEY_VALUES)[number];

export const OUTPUT_FORMAT_VALUES = ["table", "json"] as const;

export type OutputFormat = (typeof OUTPUT_FORMAT_VALUES)[number];

export type PathType = "file" | "directory";

export interface Track {
    number?: number;
    total?: number;
}

/**
 * Metadata of one tagged audio file.
 *
 * `name` holds the raw bytes the file system reported, which need not be
 * valid UTF-8. The `*SortOrder` fields only influence ordering. They are
 * never rendered and never serialized.
 */
export interface Entry {
    name: Buffer;
    size: number;
    title: string[];
    titleSortOrder?: string[];
    artist: string[];
    artistSortOrder?: string[];
    album: string[];
    albumSortOrder?: string[];
    year?: number;
    track: Track;
    genre: string[];
}

/** Entries found for one listed path or one visited subdirectory. */
export interface Info {
    /** The path as given or as walked to, byte for byte. */
    readonly path: Buffer;
    readonly pathType: PathType;
    readonly entries: readonly Entry[];
}

export interface SortSpec {
    sortBy: readonly SortKey[];
    reverse: boolean;
}

export type EntryJsonValue = string | string[];

export interface EntryJson {
    name: string;
    size: number;
    title?: EntryJsonValue;
    artist?: EntryJsonValue;
    album?: EntryJsonValue;
    year?: number;
    track?: Track;
    genre?: EntryJsonValue;
}

export interface DirectoryJson {
    path: string;
    values: EntryJson[];
}

/** Text form of a file name or path; invalid UTF-8 becomes U+FFFD. */
export const decodeLossy = (bytes: Buffer): string => bytes.toString("utf8");

const SORT_KEY_ALIASES: Record<string, SortKey> = {
    filename: "file-name",
    name: "file-name",
    file_name: "file-name",
    filesize: "file-size",
    size: "file-size",
    file_size: "file-size",
};

export const normalizeSortKey = (value: unknown): SortKey | null => {
    if (typeof value !== "string") {
        return null;
    }
    const trimmed = value.trim().toLowerCase();
    const match = SORT_KEY_VALUES.find((key) => key === trimmed);
    if (match) {
        return match;
    }
    return SORT_KEY_ALIASES[trimmed] ?? null;
};

export const normalizeOutputFormat = (value: unknown): OutputFormat | null => {
    if (typeof value !== "string") {
        return null;
    }
    const trimmed = value.trim().toLowerCase();
    return OUTPUT_FORMAT_VALUES.find((format) => format === trimmed) ?? null;
};

export const isTrackEmpty = (track: Track): boolean =>
    track.number === undefined;

const toJsonValue = (values: readonly string[]): EntryJsonValue | undefined => {
    if (values.length === 0) {
        return undefined;
    }
    if (values.length === 1) {
        return values[0];
    }
    return [...values];
};

/**
 * Builds the serialized form of an entry. Empty or absent fields are left
 * out instead of being written as null; `size` is always present.
 */
export const toEntryJson = (entry: Entry): EntryJson => {
    const json: EntryJson = {
        name: decodeLossy(entry.name),
        size: entry.size,
    };

    const title = toJsonValue(entry.title);
    if (title !== undefined) {
        json.title = title;
    }
    const artist = toJsonValue(entry.artist);
    if (artist !== undefined) {
        json.artist = artist;
    }
    const album = toJsonValue(entry.album);
    if (album !== undefined) {
        json.album = album;
    }
    if (entry.year !== undefined) {
        json.year = entry.year;
    }
    if (!isTrackEmpty(entry.track)) {
        json.track =
            entry.track.total === undefined
                ? { number: entry.track.number }
                : { number: entry.track.number, total: entry.track.total };
    }
    const genre = toJsonValue(entry.genre);
    if (genre !== undefined) {
        json.genre = genre;
    }

    return json;
};
