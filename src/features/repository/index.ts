/**
 * Local repository feature exports
 */

export {
  NO_PROJECT,
  refreshFileList,
  stageSelected,
  unstageSelected,
  commitOnly,
  pullChanges,
  loadTags,
  createLocalTag,
  deleteLocalTag,
  pushSelectedTag,
  updateRemoteUrl,
} from './localOps.js';
export { type ManifestPicker, type ProjectChoice, chooseProject, loadProject } from './projectSelection.js';
export {
  type PublishRequest,
  type PublishReport,
  type PublishStep,
  runPublishSequence,
} from './publish.js';
