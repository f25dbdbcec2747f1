import * as fs from "fs";
import * as path from "path";
import {
    decodeLossy,
    type Entry,
    type Info,
    type SortSpec,
} from "@lsmp3/listing-contract";
import { logger } from "../utils/logger";
import {
    invalidPathError,
    isNodeSystemError,
    tagReadError,
    wrapNodeError,
} from "../utils/errors";
import { compareBytes, sortEntries } from "./entryComparator";
import { toEntry } from "./entryNormalization";
import { tagExtractor as defaultTagExtractor, type TagExtractor } from "./tagExtractor";

const log = logger.child("walker");

// stat errors that mean the argument simply does not exist as a file or directory
const MISSING_PATH_CODES = new Set(["ENOENT", "ENOTDIR", "ELOOP"]);

/** A path as text or as raw bytes. */
export type PathInput = string | Buffer;

export interface ListOptions extends SortSpec {
    recursive: boolean;
    /** Listed when `paths` is empty; resolved once by the caller. */
    defaultPath: PathInput;
    tagExtractor?: TagExtractor;
}

interface WalkContext {
    sort: SortSpec;
    recursive: boolean;
    extractor: TagExtractor;
    results: Info[];
}

interface ChildNode {
    name: Buffer;
    stats: fs.Stats;
}

const SEPARATOR = Buffer.from(path.sep);

/** Joins raw path bytes without normalising, so `.` and `sub` give `./sub`. */
export function joinWalkedPath(parent: Buffer, name: Buffer): Buffer {
    const endsWithSeparator =
        parent.length >= SEPARATOR.length &&
        parent.subarray(parent.length - SEPARATOR.length).equals(SEPARATOR);
    return endsWithSeparator
        ? Buffer.concat([parent, name])
        : Buffer.concat([parent, SEPARATOR, name]);
}

const byName = (a: ChildNode, b: ChildNode) => compareBytes(a.name, b.name);

function baseName(filePath: Buffer): Buffer {
    const at = filePath.lastIndexOf(SEPARATOR);
    return at < 0 ? filePath : filePath.subarray(at + SEPARATOR.length);
}

const directoryIdentity = (stats: fs.Stats) => `${stats.dev}:${stats.ino}`;

async function statChild(childPath: Buffer): Promise<fs.Stats> {
    try {
        return await fs.promises.stat(childPath);
    } catch (error) {
        throw wrapNodeError(error, childPath);
    }
}

async function resolveTarget(target: Buffer): Promise<fs.Stats> {
    let stats: fs.Stats;
    try {
        stats = await fs.promises.stat(target);
    } catch (error) {
        if (isNodeSystemError(error) && MISSING_PATH_CODES.has(error.code)) {
            throw invalidPathError(target);
        }
        throw wrapNodeError(error, target);
    }

    if (!stats.isFile() && !stats.isDirectory()) {
        throw invalidPathError(target);
    }
    return stats;
}

async function listNamedFile(
    target: Buffer,
    stats: fs.Stats,
    context: WalkContext
): Promise<Info> {
    const extraction = await context.extractor.extract(target);

    switch (extraction.kind) {
        case "tagged":
            return {
                path: target,
                pathType: "file",
                entries: [
                    toEntry(baseName(target), stats.size, extraction.data),
                ],
            };
        case "not-tagged":
            throw tagReadError(target, extraction.reason);
        case "read-fault":
            throw wrapNodeError(extraction.error, target);
        case "tag-fault":
            throw tagReadError(target, extraction.error);
    }
}

/**
 * Extraction for a file found while enumerating a directory. Files that are
 * not tagged audio yield `null`; every other failure aborts the walk.
 */
async function readDiscoveredEntry(
    filePath: Buffer,
    child: ChildNode,
    extractor: TagExtractor
): Promise<Entry | null> {
    const extraction = await extractor.extract(filePath);

    switch (extraction.kind) {
        case "tagged":
            return toEntry(child.name, child.stats.size, extraction.data);
        case "not-tagged":
            log.debug(`Skipping ${decodeLossy(filePath)}: ${extraction.reason}`);
            return null;
        case "read-fault":
            throw wrapNodeError(extraction.error, filePath);
        case "tag-fault":
            throw tagReadError(filePath, extraction.error);
    }
}

async function walkDirectory(
    directoryPath: Buffer,
    ancestors: ReadonlySet<string>,
    context: WalkContext
): Promise<void> {
    log.debug(`Listing ${decodeLossy(directoryPath)}`);

    let names: Buffer[];
    try {
        names = await fs.promises.readdir(directoryPath, { encoding: "buffer" });
    } catch (error) {
        throw wrapNodeError(error, directoryPath);
    }

    const files: ChildNode[] = [];
    const subdirectories: ChildNode[] = [];

    for (const name of names) {
        const stats = await statChild(joinWalkedPath(directoryPath, name));
        if (stats.isFile()) {
            files.push({ name, stats });
        } else if (stats.isDirectory()) {
            if (context.recursive) {
                subdirectories.push({ name, stats });
            }
        }
    }

    files.sort(byName);
    subdirectories.sort(byName);

    const entries: Entry[] = [];
    for (const file of files) {
        const entry = await readDiscoveredEntry(
            joinWalkedPath(directoryPath, file.name),
            file,
            context.extractor
        );
        if (entry) {
            entries.push(entry);
        }
    }

    context.results.push({
        path: directoryPath,
        pathType: "directory",
        entries: sortEntries(entries, context.sort),
    });

    for (const subdirectory of subdirectories) {
        const subdirectoryPath = joinWalkedPath(directoryPath, subdirectory.name);
        const identity = directoryIdentity(subdirectory.stats);
        if (ancestors.has(identity)) {
            log.warn(
                `Not following ${decodeLossy(subdirectoryPath)}: it links back to one of its parents`
            );
            continue;
        }
        await walkDirectory(
            subdirectoryPath,
            new Set([...ancestors, identity]),
            context
        );
    }
}

/**
 * Lists every path in order. A file yields one Info with its entry; a
 * directory yields one Info for itself and, when recursive, one per
 * subdirectory, depth first. The first fault aborts the whole listing.
 */
export async function listPaths(
    paths: readonly PathInput[],
    options: ListOptions
): Promise<Info[]> {
    const targets = (paths.length > 0 ? paths : [options.defaultPath]).map(
        (target) => (typeof target === "string" ? Buffer.from(target) : target)
    );
    const context: WalkContext = {
        sort: { sortBy: options.sortBy, reverse: options.reverse },
        recursive: options.recursive,
        extractor: options.tagExtractor ?? defaultTagExtractor,
        results: [],
    };

    for (const target of targets) {
        const stats = await resolveTarget(target);
        if (stats.isFile()) {
            context.results.push(await listNamedFile(target, stats, context));
        } else {
            await walkDirectory(
                target,
                new Set([directoryIdentity(stats)]),
                context
            );
        }
    }

    return context.results;
}
