export { FilePatchStore, type PatchStore } from "./PatchStore"
export { buildPatchRecords, computeRecordId, generatePatch, type GenerateOptions, type GenerateOutcome } from "./PatchGenerator"
