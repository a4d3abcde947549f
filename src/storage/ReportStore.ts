import * as fs from 'fs-extra';
import * as path from 'path';
import dayjs from 'dayjs';
import { ErrorKind, RcaError } from '../errors';
import { AnalysisRequest, EvidenceRef, OutcomeResult } from '../types';

export interface SavedReport {
  version: 1;
  savedAt: string;
  request: {
    issueDescription: string;
    templateId: string;
    providerPreference: string[];
    evidence: EvidenceRef[];
  };
  outcome: OutcomeResult;
}

export interface ReportSummary {
  file: string;
  runId: string;
  savedAt: string;
  status: OutcomeResult['status'];
  providerUsed?: string;
}

const STATUSES: readonly string[] = ['success', 'partial_failure', 'failure'];

function isSavedReport(value: unknown): value is SavedReport {
  if (typeof value !== 'object' || value === null) return false;
  const outcome: unknown = Reflect.get(value, 'outcome');
  return (
    Reflect.get(value, 'version') === 1 &&
    typeof Reflect.get(value, 'savedAt') === 'string' &&
    typeof Reflect.get(value, 'request') === 'object' &&
    typeof outcome === 'object' &&
    outcome !== null &&
    typeof Reflect.get(outcome, 'runId') === 'string' &&
    STATUSES.includes(String(Reflect.get(outcome, 'status')))
  );
}

/** Saved analysis outcomes, one JSON file per run. */
export class ReportStore {
  constructor(private rootDir: string) {}

  async save(request: AnalysisRequest, outcome: OutcomeResult): Promise<string> {
    await fs.ensureDir(this.rootDir);
    const report: SavedReport = {
      version: 1,
      savedAt: dayjs().toISOString(),
      request: {
        issueDescription: request.issueDescription,
        templateId: request.templateId,
        providerPreference: request.providerPreference,
        evidence: request.evidence.map((e) => ({ kind: e.kind, identifier: e.identifier }))
      },
      outcome
    };
    const fileName = `${dayjs().format('YYYYMMDD_HHmmss')}_${outcome.runId}.json`;
    const filePath = path.join(this.rootDir, fileName);
    await fs.writeJSON(filePath, report, { spaces: 2 });
    return filePath;
  }

  /** Accepts a file name inside the store, a path, or a run id. */
  async load(ref: string): Promise<SavedReport> {
    const filePath = await this.resolve(ref);
    const content: unknown = await fs.readJSON(filePath);
    if (!isSavedReport(content)) {
      throw new RcaError(ErrorKind.ConfigurationError, `${filePath} is not a saved analysis report`);
    }
    return content;
  }

  async list(): Promise<ReportSummary[]> {
    if (!(await fs.pathExists(this.rootDir))) return [];

    const files = (await fs.readdir(this.rootDir)).filter((f) => f.endsWith('.json')).sort().reverse();
    const summaries: ReportSummary[] = [];
    for (const file of files) {
      const content: unknown = await fs.readJSON(path.join(this.rootDir, file)).catch(() => null);
      if (!isSavedReport(content)) continue; // not ours
      const { outcome } = content;
      summaries.push({
        file,
        runId: outcome.runId,
        savedAt: content.savedAt,
        status: outcome.status,
        ...(outcome.status === 'failure' ? {} : { providerUsed: outcome.result.providerUsed })
      });
    }
    return summaries;
  }

  private async resolve(ref: string): Promise<string> {
    const candidates = [ref, path.join(this.rootDir, ref), path.join(this.rootDir, `${ref}.json`)];
    for (const candidate of candidates) {
      if ((await fs.pathExists(candidate)) && (await fs.stat(candidate)).isFile()) {
        return candidate;
      }
    }
    if (await fs.pathExists(this.rootDir)) {
      const byRunId = (await fs.readdir(this.rootDir)).find((f) => f.endsWith(`_${ref}.json`));
      if (byRunId) return path.join(this.rootDir, byRunId);
    }
    throw new RcaError(ErrorKind.ConfigurationError, `Report ${ref} not found in ${this.rootDir}`);
  }
}
