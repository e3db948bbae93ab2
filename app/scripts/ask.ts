/**
 * Ask runner: answers one question from the command line, or starts an
 * interactive chat when no question is given.
 *
 * Usage:
 *   npm run ask -- "oldest star wars sets"
 *   npm run ask -- --no-answer "cheap technic"     (ranked sets only, no LLM)
 *   npm run ask -- --set 75192                    (details for one set)
 *   npm run ask                                   (interactive)
 */
import 'dotenv/config';
import * as readline from 'readline/promises';
import { loadConfig } from '../lib/config';
import { createAssistant, createContainer, type Container } from '../lib/container';
import { lookupSet } from '../lib/rag/assistant';
import { processAndRank } from '../lib/search/pipeline';
import type { ChatMessage, SetRecord } from '../lib/types';
import { describeSetRecord } from '../lib/utils/normalizer';

function printSets(sets: readonly SetRecord[]): void {
  if (sets.length === 0) {
    console.log('No matching sets found. Try a broader or differently worded question.');
    return;
  }
  sets.forEach((s, i) => console.log(`${i + 1}. ${describeSetRecord(s)}`));
}

async function showSet(container: Container, setId: string): Promise<void> {
  const record = await lookupSet(setId, container);
  if (!record) {
    console.log(`Set ${setId} not found.`);
    return;
  }
  console.log(describeSetRecord(record));
  if (record.description) console.log(`\n${record.description}`);
}

async function chat(container: Container): Promise<void> {
  const assistant = createAssistant(container);
  const history: ChatMessage[] = [];
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  console.log('Brick Scout. Ask about sets (empty line to quit).\n');
  try {
    for (;;) {
      const question = (await rl.question('> ')).trim();
      if (!question) break;
      const { sets, answer } = await assistant.ask(question, history);
      console.log(`\n${answer}\n`);
      printSets(sets);
      console.log('');
      history.push({ role: 'user', content: question }, { role: 'assistant', content: answer });
    }
  } finally {
    rl.close();
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const container = await createContainer(loadConfig());

  try {
    const setFlag = args.indexOf('--set');
    if (setFlag !== -1) {
      const setId = args[setFlag + 1];
      if (!setId) throw new Error('--set needs a set number, e.g. --set 75192');
      await showSet(container, setId);
      return;
    }

    const answerless = args.includes('--no-answer');
    const question = args.filter((a) => a !== '--no-answer').join(' ').trim();

    if (!question) {
      await chat(container);
    } else if (answerless) {
      printSets(await processAndRank(question, container.sources, { limit: container.config.SEARCH_RESULT_LIMIT }));
    } else {
      const { sets, answer } = await createAssistant(container).ask(question);
      console.log(`${answer}\n`);
      printSets(sets);
    }
  } finally {
    container.store.close();
  }
}

main().catch((err: unknown) => {
  console.error('Ask failed:', err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
