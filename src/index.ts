export * from './orchestration-core/Errors.js';
export * from './orchestration-core/L0/Ontology.js';
export * from './orchestration-core/L0/Clock.js';
export * from './orchestration-core/L1/GateLedger.js';
export * from './orchestration-core/L1/Guards.js';
export * from './orchestration-core/L2/CapabilityRegistry.js';
export * from './orchestration-core/L2/CapabilityCatalogue.js';
export * from './orchestration-core/L3/Scheduler.js';
export * from './orchestration-core/L3/Retry.js';
export * from './orchestration-core/L3/JobLifecycleManager.js';
export * from './orchestration-core/L4/Dispatcher.js';
export * from './orchestration-core/L5/Audit.js';
export * from './orchestration-core/L5/Projections.js';
export * from './orchestration-core/L5/Replay.js';
export * from './orchestration-core/L6/CorrectiveMemory.js';
export * from './orchestration-core/L6/Oracle.js';
export * from './orchestration-core/L7/OrchestrationLoop.js';
export * from './orchestration-core/Orchestrator.js';
export * from './infrastructure/config/Config.js';
export * from './infrastructure/persistence/SQLiteEventStore.js';
export * from './server/Server.js';
export * from './pipeline/ProteinMdPipeline.js';
