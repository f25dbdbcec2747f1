import * as fs from "fs";
import { parseBuffer, type ITag } from "music-metadata";
import { describeError, isNodeSystemError } from "../utils/errors";

export const TEXT_FIELDS = [
    "title",
    "artist",
    "album",
    "genre",
    "titleSortOrder",
    "artistSortOrder",
    "albumSortOrder",
] as const;

export type TextField = (typeof TEXT_FIELDS)[number];

type TagField = TextField | "year" | "recordingDate" | "track";

export interface TagData {
    text: Record<TextField, string[]>;
    year?: number;
    recordingDate?: string;
    track: {
        number?: number;
        total?: number;
    };
}

export type TagExtraction =
    | { kind: "tagged"; data: TagData }
    | { kind: "not-tagged"; reason: string }
    | { kind: "read-fault"; error: Error }
    | { kind: "tag-fault"; error: Error };

export interface TagExtractor {
    extract(filePath: Buffer): Promise<TagExtraction>;
}

export const ID3V2_TAG_TYPES = ["ID3v2.4", "ID3v2.3", "ID3v2.2"] as const;

export type Id3v2TagType = (typeof ID3V2_TAG_TYPES)[number];

// Frame ids per semantic field. ID3v2.2 uses three-letter ids.
const ID3V2_FRAME_IDS: Record<Id3v2TagType, Record<TagField, string[]>> = {
    "ID3v2.4": {
        title: ["TIT2"],
        artist: ["TPE1"],
        album: ["TALB"],
        genre: ["TCON"],
        titleSortOrder: ["TSOT"],
        artistSortOrder: ["TSOP"],
        albumSortOrder: ["TSOA"],
        year: ["TYER"],
        recordingDate: ["TDRC"],
        track: ["TRCK"],
    },
    "ID3v2.3": {
        title: ["TIT2"],
        artist: ["TPE1"],
        album: ["TALB"],
        genre: ["TCON"],
        titleSortOrder: ["TSOT"],
        artistSortOrder: ["TSOP"],
        albumSortOrder: ["TSOA"],
        year: ["TYER"],
        recordingDate: ["TDRC"],
        track: ["TRCK"],
    },
    "ID3v2.2": {
        title: ["TT2"],
        artist: ["TP1"],
        album: ["TAL"],
        genre: ["TCO"],
        titleSortOrder: ["TST"],
        artistSortOrder: ["TSP"],
        albumSortOrder: ["TSA"],
        year: ["TYE"],
        recordingDate: [],
        track: ["TRK"],
    },
};

/** Reverse lookup (frame id -> field), built once per tag version. */
const FRAME_LOOKUP: Record<Id3v2TagType, ReadonlyMap<string, TagField>> = {
    "ID3v2.4": buildFrameLookup("ID3v2.4"),
    "ID3v2.3": buildFrameLookup("ID3v2.3"),
    "ID3v2.2": buildFrameLookup("ID3v2.2"),
};

function buildFrameLookup(tagType: Id3v2TagType): Map<string, TagField> {
    const lookup = new Map<string, TagField>();
    const mapping = ID3V2_FRAME_IDS[tagType];
    for (const field of Object.keys(mapping)) {
        if (!isTagField(field)) {
            throw new Error(`Unknown tag field in ${tagType} mapping: ${field}`);
        }
        for (const frameId of mapping[field]) {
            if (lookup.has(frameId)) {
                throw new Error(
                    `Frame ${frameId} mapped twice in ${tagType} mapping`
                );
            }
            lookup.set(frameId, field);
        }
    }
    return lookup;
}

function isTagField(value: string): value is TagField {
    return (
        value === "year" ||
        value === "recordingDate" ||
        value === "track" ||
        TEXT_FIELDS.some((field) => field === value)
    );
}

function isTextField(field: TagField): field is TextField {
    return TEXT_FIELDS.some((textField) => textField === field);
}

function toStrings(value: unknown): string[] {
    if (typeof value === "string") {
        return [value];
    }
    if (typeof value === "number" && Number.isFinite(value)) {
        return [String(value)];
    }
    if (Array.isArray(value)) {
        return value.flatMap((item: unknown) => toStrings(item));
    }
    return [];
}

function parseUnsigned(value: string | undefined): number | undefined {
    const trimmed = value?.trim();
    if (!trimmed || !/^\d+$/.test(trimmed)) {
        return undefined;
    }
    return Number.parseInt(trimmed, 10);
}

function parseSigned(value: string | undefined): number | undefined {
    const trimmed = value?.trim();
    if (!trimmed || !/^-?\d+$/.test(trimmed)) {
        return undefined;
    }
    return Number.parseInt(trimmed, 10);
}

/** Parses `n` or `n/total` as found in track frames. */
export function parseTrackValue(value: string): TagData["track"] {
    const [numberPart, totalPart] = value.split("/", 2);
    const track: TagData["track"] = {};
    const number = parseUnsigned(numberPart);
    if (number !== undefined) {
        track.number = number;
    }
    const total = parseUnsigned(totalPart);
    if (total !== undefined) {
        track.total = total;
    }
    return track;
}

function emptyTextFields(): Record<TextField, string[]> {
    return {
        title: [],
        artist: [],
        album: [],
        genre: [],
        titleSortOrder: [],
        artistSortOrder: [],
        albumSortOrder: [],
    };
}

/**
 * Collects the mapped frames of one ID3v2 tag into `TagData`. Frames outside
 * the mapping are ignored.
 *
 * Before ID3v2.4 a text frame holds a single value, but music-metadata splits
 * some of them on `/` ("AC/DC"). Those pieces are joined back.
 */
export function collectTagData(
    tagType: Id3v2TagType,
    tags: readonly ITag[]
): TagData {
    const lookup = FRAME_LOOKUP[tagType];
    const data: TagData = { text: emptyTextFields(), track: {} };

    for (const tag of tags) {
        const field = lookup.get(tag.id);
        if (!field) {
            continue;
        }
        const values = toStrings(tag.value);
        if (isTextField(field)) {
            data.text[field].push(...values);
        } else if (field === "year" && data.year === undefined) {
            const year = parseSigned(values[0]);
            if (year !== undefined) {
                data.year = year;
            }
        } else if (
            field === "recordingDate" &&
            data.recordingDate === undefined &&
            values.length > 0
        ) {
            data.recordingDate = values[0];
        } else if (field === "track" && values.length > 0) {
            data.track = parseTrackValue(values[0]);
        }
    }

    if (tagType !== "ID3v2.4") {
        for (const field of TEXT_FIELDS) {
            if (data.text[field].length > 1) {
                data.text[field] = [data.text[field].join("/")];
            }
        }
    }

    return data;
}

export function classifyExtractionError(error: unknown): TagExtraction {
    const normalized =
        error instanceof Error ? error : new Error(describeError(error));

    if (isNodeSystemError(error)) {
        return { kind: "read-fault", error: normalized };
    }
    return { kind: "tag-fault", error: normalized };
}

const ID3V2_HEADER_LENGTH = 10;

export interface Id3v2Header {
    tagType: string;
    /** Tag length without the header, decoded from its syncsafe form. */
    size: number;
}

/** Reads the ID3v2 header at the start of `bytes`, or `null` when there is none. */
export function readId3v2Header(bytes: Uint8Array): Id3v2Header | null {
    if (
        bytes.length < ID3V2_HEADER_LENGTH ||
        bytes[0] !== 0x49 ||
        bytes[1] !== 0x44 ||
        bytes[2] !== 0x33
    ) {
        return null;
    }
    const size =
        ((bytes[6] & 0x7f) << 21) |
        ((bytes[7] & 0x7f) << 14) |
        ((bytes[8] & 0x7f) << 7) |
        (bytes[9] & 0x7f);
    return { tagType: `ID3v2.${bytes[3]}`, size };
}

function isId3v2TagType(value: string): value is Id3v2TagType {
    return ID3V2_TAG_TYPES.some((tagType) => tagType === value);
}

type TagBytes =
    | { found: false }
    | { found: true; header: Id3v2Header; bytes: Buffer; complete: boolean };

async function readTagBytes(filePath: Buffer): Promise<TagBytes> {
    const handle = await fs.promises.open(filePath, "r");
    try {
        const head = Buffer.alloc(ID3V2_HEADER_LENGTH);
        const { bytesRead } = await handle.read(head, 0, head.length, 0);
        const header = readId3v2Header(head.subarray(0, bytesRead));
        if (!header) {
            return { found: false };
        }

        const bytes = Buffer.alloc(ID3V2_HEADER_LENGTH + header.size);
        const tagRead = await handle.read(bytes, 0, bytes.length, 0);
        return {
            found: true,
            header,
            bytes: bytes.subarray(0, tagRead.bytesRead),
            complete: tagRead.bytesRead === bytes.length,
        };
    } finally {
        await handle.close();
    }
}

/**
 * ID3v2 tag extraction backed by music-metadata. Only a tag at the start of
 * the file counts; its bytes are handed to the MPEG parser on their own, so
 * whatever audio follows never affects the result.
 */
export class MusicMetadataTagExtractor implements TagExtractor {
    async extract(filePath: Buffer): Promise<TagExtraction> {
        try {
            const tag = await readTagBytes(filePath);
            if (!tag.found) {
                return { kind: "not-tagged", reason: "no tag found" };
            }

            const { tagType } = tag.header;
            if (!isId3v2TagType(tagType)) {
                return {
                    kind: "tag-fault",
                    error: new Error(`unsupported tag version ${tagType}`),
                };
            }
            if (!tag.complete) {
                return {
                    kind: "tag-fault",
                    error: new Error(`${tagType} tag is truncated`),
                };
            }

            const metadata = await parseBuffer(
                tag.bytes,
                { mimeType: "audio/mpeg", size: tag.bytes.length },
                { duration: false, skipCovers: true, skipPostHeaders: true }
            );

            return {
                kind: "tagged",
                data: collectTagData(tagType, metadata.native[tagType] ?? []),
            };
        } catch (error) {
            return classifyExtractionError(error);
        }
    }
}

export const tagExtractor: TagExtractor = new MusicMetadataTagExtractor();
