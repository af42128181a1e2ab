/**
 * Cleanup module exports
 */

export {
  DEFAULT_KEEP_COUNT,
  listArchiveFilenames,
  listArchives,
  planRotation,
  type RotateOptions,
  type RotationPlan,
  rotateArchives,
} from "./retention";
