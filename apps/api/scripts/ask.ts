#!/usr/bin/env tsx
/**
 * Ask the audit assistant one question
 * Usage:
 *  tsx scripts/ask.ts "How many pending invoices do we have?"
 *  tsx scripts/ask.ts --thread=review-7 "Summarize the Q2 audit report"
 */

import { createAuditRuntime } from '../src/index';

const args = process.argv.slice(2);
const threadArg = args.find((arg) => arg.startsWith('--thread='));
const query = args
  .filter((arg) => !arg.startsWith('--'))
  .join(' ')
  .trim();

async function main() {
  if (!query) {
    console.error('Usage: tsx scripts/ask.ts [--thread=<id>] <question>');
    process.exitCode = 1;
    return;
  }

  const threadId = threadArg ? threadArg.slice('--thread='.length) : 'default';
  const runtime = await createAuditRuntime();
  try {
    const answer = await runtime.agent.ask(query, threadId);
    console.log(answer);
  } finally {
    runtime.close();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
