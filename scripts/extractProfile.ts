#!/usr/bin/env tsx

/**
 * SkyBlock Profile Extractor
 * Run with: npm run extract -- <username> [profile] [--silent]
 */

import { config as loadEnv } from 'dotenv';
import { APP_NAME, VERSION } from '../src/config/appInfo';
import { ProfileExtractor } from '../src/services/hypixel/profileExtractor';
import { formatProfileLabel, selectProfile, type ProfileChooser } from '../src/services/hypixel/profileSelector';
import type { ExtractionSummary } from '../src/types';
import { USAGE, parseCliArgs, type CliOptions } from '../src/utils/cliArgs';
import { readApiKey, saveApiKey } from '../src/utils/credentialStore';
import { EnvValidator } from '../src/utils/envValidator';
import { AppError, ConfigError, describeFailure, redact } from '../src/utils/errorHandler';
import { createOutputDirectory, directorySize, formatSize } from '../src/utils/outputDirectory';
import { question as ask, waitForEnter, type PromptOptions } from '../src/utils/prompt';
import { Reporter } from '../src/utils/reporter';

// Load environment variables
loadEnv({ path: '.env.local' });
loadEnv();

function cancel(): never {
  console.log('\nOperation cancelled by user.');
  process.exit(130);
}

process.on('SIGINT', cancel);

const promptOptions: PromptOptions = { onInterrupt: cancel };

const question = (prompt: string): Promise<string> => ask(prompt, promptOptions);

const chooseProfile: ProfileChooser = async profiles => {
  console.log('\nAvailable profiles:');
  profiles.forEach((profile, i) => {
    console.log(`  ${i + 1}. ${formatProfileLabel(profile)}`);
  });

  while (true) {
    const choice = (await question('Select profile [1]: ')) || '1';
    const index = Number(choice);
    if (Number.isInteger(index) && index >= 1 && index <= profiles.length) {
      return index;
    }
    console.log(`Please enter a number between 1 and ${profiles.length}.`);
  }
};

async function resolveApiKey(
  configured: string | undefined,
  keyFile: string,
  options: CliOptions,
  reporter: Reporter
): Promise<string> {
  const existing = configured ?? readApiKey(keyFile);
  if (existing) return existing;

  if (options.silent) {
    throw new ConfigError(`No API key found. Set HYPIXEL_API_KEY or write the key to ${keyFile}.`);
  }

  console.log('\n📝 A Hypixel API key is required (get one at developer.hypixel.net).');
  let apiKey = '';
  while (!apiKey) {
    apiKey = await question('Enter your Hypixel API key: ');
  }
  saveApiKey(keyFile, apiKey);
  reporter.success(`API key saved to ${keyFile}`);
  return apiKey;
}

function showSummary(summary: ExtractionSummary, outputDir: string, reporter: Reporter): void {
  const rate = summary.totalCount > 0 ? (summary.successCount / summary.totalCount) * 100 : 0;

  reporter.header('Extraction Summary');
  console.log('✅ Data extraction completed!');
  console.log(`  Output directory: ${outputDir}`);
  console.log(`  Files extracted: ${summary.successCount}/${summary.totalCount}`);
  console.log(`  Success rate: ${rate.toFixed(1)}%`);
  console.log(`  Total size: ${formatSize(directorySize(outputDir))}`);

  const failed = summary.results.filter(r => r.outcome === 'failure');
  if (failed.length > 0) {
    reporter.info('\nFailed endpoints:');
    failed.forEach(r => reporter.detail(`• ${r.outputFile}: ${r.error ?? 'unknown error'}`));
  }

  reporter.info('\nNext steps:');
  reporter.detail(`1. Zip the '${outputDir}' folder for easy sharing`);
  reporter.detail('2. Upload it to your preferred AI assistant');
  reporter.detail('3. Ask for progression analysis and recommendations!');
}

async function main() {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error: unknown) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    console.error('Run with --help for usage information');
    process.exit(1);
  }

  if (options.help) {
    console.log(USAGE);
    return;
  }
  if (options.version) {
    console.log(`${APP_NAME} ${VERSION}`);
    return;
  }

  const reporter = new Reporter({ silent: options.silent });
  let apiKey: string | undefined;
  let stage = 'Startup';

  try {
    reporter.header(`${APP_NAME} v${VERSION}`);

    stage = 'Configuration';
    const validator = new EnvValidator(process.env);
    const config = validator.validateAndLoad();
    validator.warnings.forEach(w => reporter.info(`  ${w}`));

    apiKey = await resolveApiKey(config.apiKey, config.apiKeyFile, options, reporter);
    const extractor = new ProfileExtractor({ ...config, apiKey }, { reporter });

    stage = 'Connectivity check';
    if (!(await extractor.testConnection())) {
      reporter.error(`Cannot connect to ${config.hypixelApiBase}. Please check your internet connection.`);
      process.exit(1);
    }

    let username = options.username;
    if (!username) {
      if (options.silent) {
        reporter.error('Username is required in silent mode!');
        process.exit(1);
      }
      username = await question('Enter your Minecraft username: ');
      if (!username) {
        reporter.error('Username is required!');
        process.exit(1);
      }
    }

    stage = 'UUID lookup';
    reporter.info(`\n🔍 Looking up UUID for ${username}...`);
    const identity = await extractor.resolver.resolve(username);
    reporter.success(`Found player: ${identity.handle} (${identity.stableId.slice(0, 8)}...)`);

    stage = 'Profile lookup';
    reporter.info('\n📋 Fetching SkyBlock profiles...');
    const profiles = await extractor.enumerator.enumerate(identity);
    reporter.success(`Found ${profiles.length} profile${profiles.length === 1 ? '' : 's'}`);

    stage = 'Profile selection';
    const selected = await selectProfile(profiles, {
      requestedName: options.profile,
      silent: options.silent,
      choose: chooseProfile,
      reporter
    });
    if (!selected) {
      reporter.error('No profile selected!');
      process.exit(1);
    }
    reporter.success(`Selected profile: ${formatProfileLabel(selected)}`);

    stage = 'Output directory';
    const outputDir = createOutputDirectory(config.outputRoot, identity.handle, selected.displayName);
    reporter.success(`Created output directory: ${outputDir}`);

    stage = 'Extraction';
    const summary = await extractor.orchestrator.extract(identity, selected, outputDir);

    showSummary(summary, outputDir, reporter);

    if (!options.silent) {
      await waitForEnter('\nPress Enter to continue...', promptOptions);
    }
  } catch (error: unknown) {
    describeFailure(error, stage).forEach(line => reporter.error(redact(line, apiKey)));
    const unexpected = !(error instanceof AppError && error.isOperational);
    if (unexpected && !options.silent && error instanceof Error && error.stack) {
      console.error(redact(error.stack, apiKey));
    }
    process.exit(1);
  }
}

// Run the script
main().catch(error => {
  console.error(error);
  process.exit(1);
});
