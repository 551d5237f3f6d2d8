export { BuildOrchestrator } from './orchestrator.js'
export type { BuildCollaborators, BuildOptions, BuildOrchestratorDeps } from './orchestrator.js'
export { analyzeKnowledgeBase } from './analyze.js'
export type { KnowledgeBaseAnalysis } from './analyze.js'
export { createBackup, backupDirName } from './backup.js'
export { collectDocuments, toDocumentContent, qualityInputFor } from './documents.js'
export type { DocumentSource } from './documents.js'
export { BuildModeSchema, BuildStageSchema, BUILD_STAGES, stageOrder, emptyCounts } from './schemas.js'
export type {
  BuildMode,
  BuildStage,
  BuildCounts,
  BuildReport,
  BuildProgress,
  DocumentFailure,
} from './schemas.js'
