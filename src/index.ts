/**
 * Public API: locate Visual Studio solution/project files, read the
 * platforms and configurations a project declares, and drive the selection
 * sequence from any host.
 */

export * from './core/result';
export type { Disposable, OutputChannel } from './core/types';
export { LoggerService, createLogger, createStreamOutputChannel, formatLog, nullLogger } from './services/loggerService';
export type { ILogger } from './services/loggerService';
export {
  DEFAULT_SELECTOR_SETTINGS,
  type DiscoverySettings,
  type LoggingSettings,
  type SelectorSettings,
} from './services/configuration/selectorSettings';
export { discoverSettingsFile, loadSettings, parseSettings } from './services/configurationService';
export {
  createProjectFileLocator,
  type LocatedFiles,
  type ProjectFileLocator,
} from './services/discovery/projectFileLocator';
export {
  createProjectMetadataParser,
  parseProjectContent,
  type ProjectMetadata,
  type ProjectMetadataParser,
  type ProjectParseResult,
} from './services/parsers/projectMetadataParser';
export {
  applyChoice,
  clearSelection,
  createSession,
  driveSelection,
  nextStep,
  type ChoiceProvider,
  type PromptStep,
  type Selection,
  type SelectionSession,
  type SelectionStep,
  type SelectionStepKind,
  type StepOutcome,
} from './services/session/selectionSession';
export {
  fileStem,
  formatSelectionSummary,
  formatStatusLine,
  getRelativePath,
} from './services/session/selectionFormatter';
export { clearStoredSelection, loadSelection, saveSelection, selectionFilePath } from './services/session/selectionStore';
