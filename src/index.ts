export * from './types';
export * from './errors';
export { createApp, RcaApp } from './app';
export { loadConfig, LoadConfigOptions } from './config/ConfigLoader';
export { DEFAULT_CONFIG, RcaConfig, ProviderSettings, ProviderKind } from './config/RcaConfig';
export { configureLogging, createLogger, Logger, LogLevel } from './logging/Logger';
export { LLMGateway, resolveProviderOrder } from './llm/LLMGateway';
export * from './llm/providers';
export { ResponseParser } from './parsing/ResponseParser';
export { findFirstObject } from './parsing/JsonBlockScanner';
export { PromptAssembler, TRUNCATION_MARKER } from './prompt/PromptAssembler';
export { TemplateManager, PromptTemplate, TemplateDescriptor } from './templates/TemplateManager';
export { EvidenceCollector, CollectedEvidence } from './evidence/EvidenceCollector';
export { EvidenceSource } from './evidence/EvidenceSource';
export { FileEvidenceSource } from './evidence/FileEvidenceSource';
export { UrlEvidenceSource } from './evidence/UrlEvidenceSource';
export { TicketEvidenceSource } from './evidence/TicketEvidenceSource';
export { Redactor, RedactionRule } from './evidence/Redactor';
export { Orchestrator, OrchestratorDeps, RunOptions } from './orchestration/Orchestrator';
export { StateMachine, RunTracker } from './orchestration/StateMachine';
export { TicketPolicy } from './orchestration/TicketPolicy';
export { IntakeParser, IntakeRequest } from './orchestration/IntakeParser';
export { JiraClient } from './ticketing/JiraClient';
export { TicketingCollaborator, TicketReader, TicketDetails } from './ticketing/types';
export { ReportStore, SavedReport } from './storage/ReportStore';
