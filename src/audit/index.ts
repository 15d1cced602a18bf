export { canonicalJson, prettyCanonicalJson } from "./canonical.js";

export {
  sha256,
  sha256Bytes,
  computePayloadHash,
  computeEntryHash,
  verifyEntries,
  GENESIS_HASH,
  type ChainFailure,
  type ChainIntegrityReport,
} from "./hashing.js";

export {
  EvidenceStore,
  EvidenceStoreError,
  type EvidenceStoreErrorCode,
  type EvidenceChain,
  type EvidenceEntry,
  type EntryFilter,
} from "./store.js";

export {
  EvidenceMirror,
  FileMirrorTarget,
  MemoryMirrorTarget,
  compareChains,
  type DivergenceReport,
  type MirrorStatus,
  type MirrorTarget,
} from "./mirror.js";
