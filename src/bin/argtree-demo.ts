#!/usr/bin/env node
import { demoCommand } from '@/bin/demo/commands';
import { run } from '@/bin/run';

async function main(): Promise<void> {
  const code = await run(demoCommand);
  process.exit(typeof code === 'number' ? code : 0);
}

main().catch((error: unknown) => {
  console.error('argtree-demo error:', error);
  process.exit(1);
});
