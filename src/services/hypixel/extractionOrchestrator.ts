/**
 * Extraction Orchestrator
 * Walks the extraction plan for one player/profile and saves every response
 * to the run's output directory. One failed entry never stops the run.
 */

import * as fs from 'fs';
import * as path from 'path';
import { EXTRACTION_PLAN, renderEndpoint } from '../../config/extractionPlan';
import type { ExtractionResult, ExtractionSummary, Identity, PlanEntry, ProfileSummary } from '../../types';
import { errorMessage } from '../../utils/errorHandler';
import { Reporter } from '../../utils/reporter';
import type { JsonCaller } from './rateLimitedCaller';

export class ExtractionOrchestrator {
  constructor(
    private readonly api: JsonCaller,
    private readonly reporter: Reporter = new Reporter(),
    private readonly plan: readonly PlanEntry[] = EXTRACTION_PLAN
  ) {}

  /**
   * Save data to file as indented JSON
   */
  private saveData(outputDir: string, filename: string, data: unknown): void {
    const filepath = path.join(outputDir, filename);
    fs.writeFileSync(filepath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
  }

  async extract(identity: Identity, profile: ProfileSummary, outputDir: string): Promise<ExtractionSummary> {
    this.reporter.header('Extracting Profile Data');

    const params = { uuid: identity.stableId, profileId: profile.profileId };
    const results: ExtractionResult[] = [];

    for (const entry of this.plan) {
      const endpoint = renderEndpoint(entry.endpoint, params);
      this.reporter.info(`Extracting ${entry.description}...`);

      try {
        const data = await this.api.call(endpoint, entry.description);
        this.saveData(outputDir, entry.outputFile, data);
        this.reporter.success(`Saved ${entry.outputFile}`);
        results.push({ endpoint, outputFile: entry.outputFile, outcome: 'success' });
      } catch (error) {
        const message = errorMessage(error);
        this.reporter.warning(`Failed to extract ${entry.description}: ${message}`);
        results.push({ endpoint, outputFile: entry.outputFile, outcome: 'failure', error: message });
      }
    }

    const outputs = results.filter(r => r.outcome === 'success').map(r => r.outputFile);

    return {
      successCount: outputs.length,
      totalCount: this.plan.length,
      outputs,
      results
    };
  }
}
