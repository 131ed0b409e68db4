export { StagingFile, type SegmentHandle } from "./StagingFile";
export { OutputReservations, numberedCandidates, stagingPathFor } from "./OutputReservations";
