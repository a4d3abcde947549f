import { RcaConfig } from './config/RcaConfig';
import { EvidenceCollector } from './evidence/EvidenceCollector';
import { LLMGateway } from './llm/LLMGateway';
import { Logger } from './logging/Logger';
import { Orchestrator } from './orchestration/Orchestrator';
import { ReportStore } from './storage/ReportStore';
import { TemplateManager } from './templates/TemplateManager';
import { JiraClient } from './ticketing/JiraClient';

export interface RcaApp {
  config: RcaConfig;
  gateway: LLMGateway;
  templates: TemplateManager;
  evidence: EvidenceCollector;
  reports: ReportStore;
  orchestrator: Orchestrator;
  jira?: JiraClient;
}

/** Wires every component from one loaded configuration. */
export function createApp(config: RcaConfig, logger?: Logger): RcaApp {
  const jira = config.ticketing.baseUrl ? new JiraClient(config.ticketing, logger?.child('Jira')) : undefined;
  const gateway = LLMGateway.fromConfig(config, logger?.child('Gateway'));
  const templates = new TemplateManager(config.promptsDir, logger?.child('Templates'));
  const evidence = EvidenceCollector.fromConfig(config, jira, logger?.child('Evidence'));

  const orchestrator = new Orchestrator({
    config,
    evidence,
    templates,
    gateway,
    ticketing: config.ticketing.enabled ? jira : undefined,
    logger: logger?.child('Orchestrator')
  });

  return { config, gateway, templates, evidence, reports: new ReportStore(config.outputDir), orchestrator, jira };
}
