export { applyPatch, clearPatch, clearSegments, type ApplyOptions, type ApplyOutcome, type ClearOutcome } from "./PatchApplier"
