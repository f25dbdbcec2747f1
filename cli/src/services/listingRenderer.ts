import {
    decodeLossy,
    toEntryJson,
    type DirectoryJson,
    type Entry,
    type EntryJson,
    type Info,
    type SortSpec,
    type Track,
} from "@lsmp3/listing-contract";
import { sortEntries } from "./entryComparator";

const SIZE_SUFFIXES = ["B", "kiB", "MiB", "GiB", "TiB", "PiB", "EiB"] as const;
const SIZE_BASE = 1024;

const TABLE_COLUMNS: ReadonlyArray<{
    header: string;
    cell: (entry: Entry) => string;
}> = [
    { header: "NAME", cell: (entry) => decodeLossy(entry.name) },
    { header: "SIZE", cell: (entry) => humanReadableSize(entry.size) },
    { header: "TITLE", cell: (entry) => entry.title.join("/") },
    { header: "ARTIST", cell: (entry) => entry.artist.join("/") },
    { header: "ALBUM", cell: (entry) => entry.album.join("/") },
    {
        header: "YEAR",
        cell: (entry) => (entry.year === undefined ? "" : String(entry.year)),
    },
    { header: "TRACK", cell: (entry) => formatTrack(entry.track) },
    { header: "GENRE", cell: (entry) => entry.genre.join("/") },
];

/**
 * Base-1024 size with one decimal place below 10 units (8080 -> "7.9 kiB").
 * Sizes under 10 bytes are printed as is.
 */
export function humanReadableSize(size: number): string {
    if (size < 10) {
        return `${size} ${SIZE_SUFFIXES[0]}`;
    }
    let exponent = 0;
    while (
        exponent < SIZE_SUFFIXES.length - 1 &&
        size >= Math.pow(SIZE_BASE, exponent + 1)
    ) {
        exponent++;
    }
    const value =
        Math.floor((size / Math.pow(SIZE_BASE, exponent)) * 10 + 0.5) / 10;
    return `${value.toFixed(value < 10 ? 1 : 0)} ${SIZE_SUFFIXES[exponent]}`;
}

export function formatTrack(track: Track): string {
    if (track.number === undefined) {
        return "";
    }
    return track.total === undefined
        ? String(track.number)
        : `${track.number}/${track.total}`;
}

const COMBINING_MARK = /\p{M}/gu;

/** Columns a cell occupies: one per code point, none for combining marks. */
export function displayWidth(text: string): number {
    return [...text.replace(COMBINING_MARK, "")].length;
}

const padCell = (text: string, width: number) =>
    text + " ".repeat(Math.max(0, width - displayWidth(text)));

/** Space-aligned table with a header row; empty when there are no entries. */
export function renderTable(entries: readonly Entry[]): string {
    if (entries.length === 0) {
        return "";
    }

    const rows = [
        TABLE_COLUMNS.map((column) => column.header),
        ...entries.map((entry) =>
            TABLE_COLUMNS.map((column) => column.cell(entry))
        ),
    ];
    const widths = TABLE_COLUMNS.map((_, index) =>
        Math.max(...rows.map((row) => displayWidth(row[index])))
    );

    return rows
        .map(
            (row) =>
                row
                    .map((cell, index) => ` ${padCell(cell, widths[index])} `)
                    .join(" ") + "\n"
        )
        .join("");
}

export function renderJsonEntries(entries: readonly Entry[]): EntryJson[] {
    return entries.map(toEntryJson);
}

export interface ListingGroup {
    /** Heading for the block; absent for the merged file block or a lone result. */
    path?: string;
    entries: readonly Entry[];
}

/**
 * One result is shown on its own. With several, entries of all named files
 * are merged and sorted into a single leading group, followed by one group
 * per directory.
 */
export function groupResults(
    results: readonly Info[],
    sort: SortSpec
): ListingGroup[] {
    if (results.length === 1) {
        return [{ entries: results[0].entries }];
    }

    const groups: ListingGroup[] = [];
    const fileEntries = results
        .filter((info) => info.pathType === "file")
        .flatMap((info) => info.entries);
    if (results.some((info) => info.pathType === "file")) {
        groups.push({ entries: sortEntries(fileEntries, sort) });
    }
    for (const info of results) {
        if (info.pathType === "directory") {
            groups.push({ path: decodeLossy(info.path), entries: info.entries });
        }
    }
    return groups;
}

export function renderTableOutput(groups: readonly ListingGroup[]): string {
    return groups
        .map((group) =>
            group.path === undefined
                ? renderTable(group.entries)
                : `${group.path}:\n${renderTable(group.entries)}`
        )
        .join("\n");
}

export function renderJsonOutput(groups: readonly ListingGroup[]): string {
    const values: Array<EntryJson[] | DirectoryJson> = groups.map((group) =>
        group.path === undefined
            ? renderJsonEntries(group.entries)
            : { path: group.path, values: renderJsonEntries(group.entries) }
    );
    return JSON.stringify(values.length === 1 ? values[0] : values);
}
