import { createInterface } from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { join } from 'node:path';
//
import { config } from 'dotenv';
import {
  FakeLiteratureSearch,
  FakeReportBuilder,
  FakeVisualizer,
  FileRecordStore,
  OpenAITextCompletion,
  createAssistant,
  loadConfigFromEnv
} from 'helix-assistant';
config()
//

const dataDir = process.env.HELIX_DATA_DIR ?? './data';
const helixConfig = loadConfigFromEnv(process.env);

const assistant = createAssistant(helixConfig, {
  textCompletion: new OpenAITextCompletion({
    apiKey: process.env.OPENAI_API_KEY ?? '',
    baseUrl: process.env.OPENAI_BASE_URL,
    model: process.env.OPENAI_MODEL ?? helixConfig.defaultModel
  }),
  // No literature, plotting or PDF backends ship with the demo.
  literature: new FakeLiteratureSearch(),
  visualizer: new FakeVisualizer(),
  reports: new FakeReportBuilder(),
  sessionRecords: new FileRecordStore(join(dataDir, 'sessions')),
  metricRecords: new FileRecordStore(join(dataDir, 'metrics'))
});

async function main(): Promise<void> {
  await assistant.start();
  const rl = createInterface({ input, output });
  let sessionId: string | undefined = process.env.HELIX_SESSION_ID;

  console.log('Paste a DNA/RNA sequence or ask a question. Type "exit" to quit.');

  try {
    for (;;) {
      const line = (await rl.question('> ')).trim();
      if (!line) continue;
      if (line === 'exit') break;

      const result = await assistant.route(line, sessionId, 'terminal');
      sessionId = result.sessionId;

      if (result.success) {
        console.log(result.response);
      } else {
        console.log(result.response ?? `Error (${result.error.kind}): ${result.error.message}`);
      }
    }
  } finally {
    rl.close();
    const summary = assistant.tracker.summary();
    console.log(`Executions: ${summary.totalExecutions}, cost: $${summary.totalCost.toFixed(6)}`);
    await assistant.close();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
