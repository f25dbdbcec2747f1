export {
    listPaths,
    joinWalkedPath,
    type ListOptions,
    type PathInput,
} from "./services/pathWalker";
export {
    compareBytes,
    compareEntries,
    compareFolded,
    compareText,
    sortEntries,
    type Ordering,
} from "./services/entryComparator";
export { toEntry, yearFromRecordingDate } from "./services/entryNormalization";
export {
    MusicMetadataTagExtractor,
    tagExtractor,
    type TagData,
    type TagExtraction,
    type TagExtractor,
} from "./services/tagExtractor";
export {
    displayWidth,
    formatTrack,
    groupResults,
    humanReadableSize,
    renderJsonOutput,
    renderTable,
    renderTableOutput,
} from "./services/listingRenderer";
export { AppError, ErrorCategory, ErrorCode } from "./utils/errors";
export { run, parseArguments } from "./cli";
