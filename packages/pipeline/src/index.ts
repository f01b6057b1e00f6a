export {
  CheckpointStore,
  type CheckpointFile,
  defaultCheckpointPath,
  parseCheckpoint,
} from "./checkpoint/store";
export { JsonlSink, repairTrailingPartialLine } from "./sink/jsonl";
export {
  type NormalizeFn,
  type ProjectResult,
  type ProjectStatus,
  type ScrapeParams,
  scrapeProjects,
  type ScrapeRunResult,
  type ScrapeState,
} from "./stages/scrape";
