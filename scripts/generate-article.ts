/**
 * Generate an SEO article for a topic with the full content pipeline.
 *
 * Writes per-step snapshots to PIPELINE_CACHE_DIR and the run report plus the article
 * markdown to PIPELINE_OUTPUT_DIR. Exits with code 1 when the run fails.
 *
 * Usage:
 *   npx tsx scripts/generate-article.ts "Sourdough baking for beginners"
 *   npx tsx scripts/generate-article.ts "Remote work tools" --words=1500 --tone=friendly
 *
 * Requires OPENROUTER_API_KEY (see .env.example).
 */

import { config } from 'dotenv';
config();

import { createOpenRouterTextGenerator, isAIConfigured } from '../src/ai';
import {
  DEFAULT_STEP_SEQUENCE,
  FileResultCache,
  Orchestrator,
  createCallbackSink,
  createContentStepRegistry,
  getPipelineSettings,
  getRunOutcome,
  writeRunArtifacts,
  type ContentBriefOverrides,
} from '../src/ai/pipeline';

// ============================================================================
// Arguments
// ============================================================================

interface CliArgs {
  readonly topic: string;
  readonly brief: ContentBriefOverrides;
}

function parseArgs(argv: readonly string[]): CliArgs {
  const positional: string[] = [];
  let targetWordCount: number | undefined;
  let tone: string | undefined;

  for (const arg of argv) {
    if (arg.startsWith('--words=')) {
      const value = Number(arg.slice('--words='.length));
      if (!Number.isFinite(value) || value <= 0) {
        throw new Error(`Invalid --words value: ${arg}`);
      }
      targetWordCount = value;
    } else if (arg.startsWith('--tone=')) {
      tone = arg.slice('--tone='.length);
    } else {
      positional.push(arg);
    }
  }

  return { topic: positional.join(' '), brief: { targetWordCount, tone } };
}

// ============================================================================
// Main
// ============================================================================

async function main() {
  const { topic, brief } = parseArgs(process.argv.slice(2));
  if (!topic.trim()) {
    console.error('Usage: npx tsx scripts/generate-article.ts "<topic>" [--words=N] [--tone=TONE]');
    process.exit(1);
  }
  if (!isAIConfigured()) {
    throw new Error('OPENROUTER_API_KEY not set');
  }

  const settings = getPipelineSettings();
  const orchestrator = new Orchestrator({
    resolver: createContentStepRegistry({ generator: createOpenRouterTextGenerator(), brief }),
    cache: new FileResultCache(settings.cacheDir),
  });

  console.log(`\n📝 Generating article: "${topic}"`);
  console.log(`   Steps: ${DEFAULT_STEP_SEQUENCE.join(' → ')}`);

  const sink = createCallbackSink((fraction, _snapshot, message) => {
    console.log(`   [${String(Math.round(fraction * 100)).padStart(3)}%] ${message}`);
  });

  const state = await orchestrator.run(topic, DEFAULT_STEP_SEQUENCE, sink);
  const outcome = getRunOutcome(state);
  const artifacts = await writeRunArtifacts(state, settings.outputDir);

  console.log(`\n📄 Run report: ${artifacts.reportPath}`);
  if (artifacts.articlePath) {
    console.log(`📄 Article: ${artifacts.articlePath}`);
  }

  for (const failure of Object.values(state.failedSteps)) {
    console.log(`   ⚠️  ${failure.stepId}: ${failure.message}`);
  }

  if (outcome === 'failed') {
    console.error('\n❌ Run failed: no article produced');
    process.exit(1);
  }
  console.log(outcome === 'degraded' ? '\n⚠️  Completed with failed steps' : '\n✅ Done');
}

main().catch((err) => {
  console.error('Generation failed:', err);
  process.exit(1);
});
