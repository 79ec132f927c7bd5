export { AudioResponder } from './audio-responder.js';
export { CaptureClassifyClient } from './capture-classify.js';
export { KeywordDetectionProducer } from './keyword-producer.js';
export type { DetectionEvent, DetectionGate, KeywordProducerOptions } from './keyword-producer.js';
export { TriggerOrchestrator, TriggerState } from './trigger-orchestrator.js';
export type { CycleOutcome, CycleReport, OrchestratorOptions } from './trigger-orchestrator.js';
export { runPipeline } from './pipeline.js';
export type { PipelineLoop } from './pipeline.js';
