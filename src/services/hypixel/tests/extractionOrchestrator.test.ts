import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ExtractionOrchestrator } from '../extractionOrchestrator';
import type { JsonCaller } from '../rateLimitedCaller';
import type { Identity, PlanEntry, ProfileSummary } from '../../../types';
import { EXTRACTION_PLAN, renderEndpoint } from '../../../config/extractionPlan';
import { ApiError, ApiLogicError } from '../../../utils/errorHandler';
import { Reporter } from '../../../utils/reporter';

const identity: Identity = { handle: 'Foo', stableId: 'abcdef01-2345-6789-abcd-ef0123456789' };
const profile: ProfileSummary = {
  profileId: 'p1',
  displayName: 'Apple',
  mode: 'normal',
  lastUpdate: 100,
  isSelected: true,
  raw: { profile_id: 'p1' }
};

const plan: PlanEntry[] = [1, 2, 3, 4, 5].map(n => ({
  endpoint: `entry${n}?profile={profileId}`,
  outputFile: `entry${n}.json`,
  description: `Entry ${n}`
}));

function fakeCaller() {
  const call = vi.fn(async (endpoint: string, context?: string) => {
    if (endpoint.startsWith('entry3')) {
      throw new ApiError(context ?? 'API call', new ApiLogicError('Invalid profile'), 3);
    }
    return { success: true, endpoint, nested: { deeper: { deepest: [1, 2, { level: 4 }] } } };
  });
  const caller: JsonCaller = { call };
  return { caller, call };
}

describe('ExtractionOrchestrator', () => {
  let tmpRoot: string;

  beforeEach(() => {
    tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'extractor-test-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(tmpRoot, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should keep going past a failing entry and tally the results', async () => {
    const { caller, call } = fakeCaller();
    const orchestrator = new ExtractionOrchestrator(caller, new Reporter({ silent: true }), plan);

    const summary = await orchestrator.extract(identity, profile, tmpRoot);

    expect(call).toHaveBeenCalledTimes(5);
    expect(call.mock.calls.map(args => args[0])).toEqual([
      'entry1?profile=p1',
      'entry2?profile=p1',
      'entry3?profile=p1',
      'entry4?profile=p1',
      'entry5?profile=p1'
    ]);
    expect(summary.successCount).toBe(4);
    expect(summary.totalCount).toBe(5);
    expect(summary.outputs).toEqual(['entry1.json', 'entry2.json', 'entry4.json', 'entry5.json']);
    expect(fs.readdirSync(tmpRoot).sort()).toEqual(['entry1.json', 'entry2.json', 'entry4.json', 'entry5.json']);
    expect(summary.results[2]).toEqual({
      endpoint: 'entry3?profile=p1',
      outputFile: 'entry3.json',
      outcome: 'failure',
      error: 'Entry 3 failed - Invalid profile'
    });
  });

  it('should write indented JSON without truncating nested data', async () => {
    const call = vi.fn(async () => ({ a: { b: { c: { d: [1] } } } }));
    const orchestrator = new ExtractionOrchestrator({ call }, new Reporter({ silent: true }), plan.slice(0, 1));

    await orchestrator.extract(identity, profile, tmpRoot);

    expect(fs.readFileSync(path.join(tmpRoot, 'entry1.json'), 'utf-8')).toBe(
      '{\n  "a": {\n    "b": {\n      "c": {\n        "d": [\n          1\n        ]\n      }\n    }\n  }\n}\n'
    );
  });

  it('should produce identical files for identical data in separate runs', async () => {
    const firstDir = path.join(tmpRoot, 'first');
    const secondDir = path.join(tmpRoot, 'second');
    fs.mkdirSync(firstDir);
    fs.mkdirSync(secondDir);

    const first = await new ExtractionOrchestrator(fakeCaller().caller, new Reporter({ silent: true }), plan).extract(
      identity,
      profile,
      firstDir
    );
    await new ExtractionOrchestrator(fakeCaller().caller, new Reporter({ silent: true }), plan).extract(
      identity,
      profile,
      secondDir
    );

    for (const file of first.outputs) {
      expect(fs.readFileSync(path.join(secondDir, file))).toEqual(fs.readFileSync(path.join(firstDir, file)));
    }
  });

  it('should count a write failure as a failed entry', async () => {
    const missingDir = path.join(tmpRoot, 'does-not-exist');
    const call = vi.fn(async () => ({ success: true }));
    const orchestrator = new ExtractionOrchestrator({ call }, new Reporter({ silent: true }), plan.slice(0, 2));

    const summary = await orchestrator.extract(identity, profile, missingDir);

    expect(summary.successCount).toBe(0);
    expect(summary.totalCount).toBe(2);
    expect(summary.results.every(r => r.outcome === 'failure')).toBe(true);
  });
});

describe('extraction plan', () => {
  it('should start with the full profile', () => {
    expect(EXTRACTION_PLAN[0]).toEqual({
      endpoint: 'skyblock/profile?profile={profileId}',
      outputFile: 'profile.json',
      description: 'Full Profile'
    });
  });

  it('should not reuse output file names', () => {
    const files = EXTRACTION_PLAN.map(entry => entry.outputFile);
    expect(new Set(files).size).toBe(files.length);
  });

  it('should render both placeholders with encoded values', () => {
    expect(renderEndpoint('guild?player={uuid}&p={profileId}', { uuid: 'a-b', profileId: 'x y' })).toBe(
      'guild?player=a-b&p=x%20y'
    );
  });
});
