#!/usr/bin/env tsx
import { access } from 'node:fs/promises';
import { resolve } from 'node:path';
import { createInterface } from 'node:readline/promises';
import { loadTutorialConfig } from '@/config/tutorial';
import { parseTutorialArgs } from '@/lib/tutorial/args';
import { makeTutorial } from '@/lib/tutorial/runtime';
import type { ResourceHint } from '@/types/tutorial';

async function collectResources(paths: string[]): Promise<ResourceHint[]> {
  if (!paths.length) {
    console.error('No resource paths provided.');
    return [];
  }
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    const resources: ResourceHint[] = [];
    for (const raw of paths) {
      const path = resolve(raw);
      await access(path).catch((err: unknown) => {
        throw new Error(`Incorrect path: ${path}`, { cause: err });
      });
      const purpose = (await rl.question(`What is the purpose of ${path}? `)).trim();
      resources.push({ path, purpose: purpose || 'unspecified' });
      console.error(`  Path: ${path} -> Purpose: ${purpose || 'unspecified'}`);
    }
    return resources;
  } finally {
    rl.close();
  }
}

async function main() {
  const args = parseTutorialArgs(process.argv.slice(2));
  const config = loadTutorialConfig();
  const resources = await collectResources(args.ioPaths);

  const result = await makeTutorial(
    {
      topic: args.topic,
      narrationMode: args.narration,
      approvalPolicy: args.forceApprove ? 'force-approve' : 'manual',
      kernel: args.kernel,
      resources,
      maxSegments: args.maxSegments
    },
    config,
    {
      onStart: (orchestrator) => {
        process.once('SIGINT', () => orchestrator.abort('interrupted'));
      }
    }
  );

  if (result.outcome.status === 'aborted') {
    console.error(`Tutorial aborted: ${result.outcome.reason}`);
    process.exitCode = 130;
    return;
  }
  console.error(`Tutorial written to ${result.dir}`);
  if (result.artifacts) {
    console.log(
      JSON.stringify(
        {
          id: result.id,
          manifest: result.artifacts.manifestPath,
          video: result.artifacts.video.ok ? result.artifacts.video.path : null,
          degraded: result.outcome.run.degradedSegments
        },
        null,
        2
      )
    );
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
