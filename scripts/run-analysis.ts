import { readFile } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import { loadConfig } from '@hemascope/schemas/src/config-loader.js';
import { buildAnalysisAgent } from '@hemascope/core/src/orchestration/analysis-agent.factory.js';
import { PDF_MEDIA_TYPE } from '@hemascope/shared/src/types/document.types.js';

async function main(): Promise<void> {
  const reportPath = process.argv[2];
  if (!reportPath) {
    console.error('Usage: tsx scripts/run-analysis.ts <report.pdf> [configDir]');
    process.exit(1);
  }
  const configDir = process.argv[3] ?? resolve(process.cwd(), 'config');

  console.log('=== Hemascope Analysis Runner ===\n');
  console.log(`Report: ${reportPath}`);
  console.log(`Config directory: ${configDir}`);
  console.log(`Mock LLM: ${process.env['HEMASCOPE_MOCK_LLM'] === 'true' ? 'yes' : 'no'}\n`);

  const startTime = Date.now();

  const config = await loadConfig(configDir);
  console.log(
    `Candidates: ${config.cascade.candidates.map((c) => `${c.id} (${c.endpoint.model})`).join(', ')}\n`,
  );

  const agent = await buildAnalysisAgent(config);
  const bytes = new Uint8Array(await readFile(reportPath));

  const controller = new AbortController();
  process.once('SIGINT', () => {
    controller.abort();
  });

  console.log('Running analysis...\n');
  const outcome = await agent.analyze({
    document: {
      bytes,
      mediaType: PDF_MEDIA_TYPE,
      size: bytes.byteLength,
      fileName: basename(reportPath),
    },
    signal: controller.signal,
  });
  const elapsed = Date.now() - startTime;

  const attempts =
    outcome.status === 'succeeded' ? outcome.result.attempts : outcome.error.attempts;

  if (outcome.status === 'succeeded') {
    const { result } = outcome;
    console.log(`--- Insight (${result.model}, ${String(result.pageCount)} pages) ---`);
    if (result.insight.format === 'sections') {
      for (const section of result.insight.sections) {
        console.log(`\n[${section.title}]`);
        console.log(section.content);
      }
      if (result.insight.missingSections.length > 0) {
        console.log(`\nMissing sections: ${result.insight.missingSections.join(', ')}`);
      }
    } else {
      console.log(result.insight.text);
    }
    if (result.promptTruncated) {
      console.log('\nNote: the report was truncated to fit the prompt budget.');
    }
  } else {
    console.log(`--- Failed (${outcome.error.kind} / ${outcome.error.reason}) ---`);
    console.log(outcome.error.message);
  }

  console.log('\n--- Attempts ---');
  for (const attempt of attempts) {
    const reason = attempt.failureReason ? `: ${attempt.failureReason}` : '';
    console.log(
      `  ${attempt.candidateId} (${attempt.model}) ${attempt.outcome} in ${String(attempt.latencyMs)}ms${reason}`,
    );
  }

  console.log(`\nCompleted in ${String(elapsed)}ms`);

  if (outcome.status === 'failed') {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error('Analysis runner failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
