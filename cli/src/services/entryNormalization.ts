import type { Entry, Track } from "@lsmp3/listing-contract";
import type { TagData } from "./tagExtractor";

const RECORDING_YEAR_PATTERN = /^\s*(-?\d+)/;

const withoutEmptyValues = (values: readonly string[]): string[] =>
    values.filter((value) => value.length > 0);

const toSortOrder = (values: readonly string[]): string[] | undefined => {
    const filtered = withoutEmptyValues(values);
    return filtered.length > 0 ? filtered : undefined;
};

/**
 * Year of a recording date such as `2002` or `2002-05-01T12:00`.
 */
export function yearFromRecordingDate(date: string): number | undefined {
    const match = RECORDING_YEAR_PATTERN.exec(date);
    if (!match) {
        return undefined;
    }
    const year = Number.parseInt(match[1], 10);
    return Number.isSafeInteger(year) ? year : undefined;
}

function resolveYear(tag: TagData): number | undefined {
    if (tag.year !== undefined) {
        return tag.year;
    }
    if (tag.recordingDate !== undefined) {
        return yearFromRecordingDate(tag.recordingDate);
    }
    return undefined;
}

function toTrack(tag: TagData): Track {
    const track: Track = {};
    if (tag.track.number !== undefined) {
        track.number = tag.track.number;
    }
    if (tag.track.total !== undefined) {
        track.total = tag.track.total;
    }
    return track;
}

/** Builds the listing entry of one file from its extracted tag. */
export function toEntry(name: Buffer, size: number, tag: TagData): Entry {
    const entry: Entry = {
        name,
        size,
        title: withoutEmptyValues(tag.text.title),
        artist: withoutEmptyValues(tag.text.artist),
        album: withoutEmptyValues(tag.text.album),
        track: toTrack(tag),
        genre: withoutEmptyValues(tag.text.genre),
    };

    const titleSortOrder = toSortOrder(tag.text.titleSortOrder);
    if (titleSortOrder) {
        entry.titleSortOrder = titleSortOrder;
    }
    const artistSortOrder = toSortOrder(tag.text.artistSortOrder);
    if (artistSortOrder) {
        entry.artistSortOrder = artistSortOrder;
    }
    const albumSortOrder = toSortOrder(tag.text.albumSortOrder);
    if (albumSortOrder) {
        entry.albumSortOrder = albumSortOrder;
    }
    const year = resolveYear(tag);
    if (year !== undefined) {
        entry.year = year;
    }

    return entry;
}
