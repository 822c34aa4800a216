#!/usr/bin/env npx tsx
/**
 * Master Test Runner
 * Runs every suite in its own process and exits non-zero if any failed
 */

import { spawn } from 'child_process';

const TEST_FILES = [
  { name: 'Registry', file: 'registry.test.ts' },
  { name: 'Persistence Gateway', file: 'gateway.test.ts' },
  { name: 'Session Cache', file: 'sessions.test.ts' },
  { name: 'Economy API', file: 'api.test.ts' },
  { name: 'HTTP Routes', file: 'routes.test.ts' },
  { name: 'Store Statements', file: 'store.test.ts' },
  { name: 'Configuration', file: 'config.test.ts' },
];

interface TestSuiteResult {
  name: string;
  file: string;
  passed: boolean;
  duration: number;
}

const results: TestSuiteResult[] = [];

function runTest(name: string, file: string): Promise<TestSuiteResult> {
  return new Promise((resolve) => {
    const start = Date.now();
    // Same node binary, tsx as the loader.
    const proc = spawn(process.execPath, ['--import', 'tsx', `src/tests/${file}`], {
      cwd: process.cwd(),
      env: process.env,
    });

    proc.stdout.pipe(process.stdout);
    proc.stderr.pipe(process.stderr);

    proc.on('close', (code) => {
      resolve({ name, file, passed: code === 0, duration: Date.now() - start });
    });

    proc.on('error', (err) => {
      console.error(`Could not start ${file}: ${err.message}`);
      resolve({ name, file, passed: false, duration: Date.now() - start });
    });
  });
}

async function main() {
  console.log('╔═══════════════════════════════════════════════════════════════╗');
  console.log('║         STOREFRONT ECONOMY: FULL TEST SUITE                   ║');
  console.log('╚═══════════════════════════════════════════════════════════════╝\n');
  console.log(`Running ${TEST_FILES.length} test suites...\n`);
  console.log('═'.repeat(65) + '\n');

  const startTime = Date.now();

  for (const test of TEST_FILES) {
    console.log(`\n${'─'.repeat(65)}`);
    console.log(`▶ ${test.name} (${test.file})`);
    console.log(`${'─'.repeat(65)}\n`);

    const result = await runTest(test.name, test.file);
    results.push(result);

    console.log(`\n${result.passed ? '✅' : '❌'} ${test.name}: ${result.passed ? 'PASSED' : 'FAILED'} (${result.duration}ms)`);
  }

  const totalDuration = Date.now() - startTime;

  console.log('\n' + '═'.repeat(65));
  console.log('                    FINAL REPORT');
  console.log('═'.repeat(65) + '\n');

  const passed = results.filter(r => r.passed).length;
  const failed = results.filter(r => !r.passed).length;

  console.log(`Test Suites: ${passed} passed, ${failed} failed, ${results.length} total`);
  console.log(`Duration:    ${(totalDuration / 1000).toFixed(1)}s`);
  console.log('');

  console.log('Results:');
  for (const result of results) {
    const icon = result.passed ? '✅' : '❌';
    console.log(`  ${icon} ${result.name.padEnd(25)} ${(result.duration + 'ms').padStart(8)}`);
  }

  if (failed > 0) {
    console.log('\nFailed test suites:');
    for (const result of results.filter(r => !r.passed)) {
      console.log(`  ❌ ${result.name}: ${result.file}`);
    }
  }

  console.log('\n' + '═'.repeat(65));
  if (failed === 0) {
    console.log('                  ✅ ALL TESTS PASSED!');
  } else {
    console.log('                  ❌ SOME TESTS FAILED');
  }
  console.log('═'.repeat(65) + '\n');

  process.exit(failed > 0 ? 1 : 0);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
