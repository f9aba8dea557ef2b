import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { extractCommands, runPipeline, type PipelineDeps } from '../../src/pipeline.js';
import { Reporter } from '../../src/report.js';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import type { GuideCheckConfig } from '../../src/config/schema.js';
import { GuideCheckError, GuideCheckErrorCode } from '../../src/shared/errors.js';
import { FakeRuntime, FakeSyntaxChecker, captureStream } from '../helpers/fakes.js';

const FIXTURES = path.join(__dirname, '..', 'fixtures');
const FINGERPRINT = 'A1B2C3D4E5F60718293A4B5C6D7E8F9012345678';

function fixture(name: string): string {
  return path.join(FIXTURES, name);
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('expected the pipeline to fail');
}

describe('runPipeline', () => {
  let dir: string;
  let config: GuideCheckConfig;
  let checker: FakeSyntaxChecker;
  let out: ReturnType<typeof captureStream>;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'igc-pipeline-'));
    config = { ...DEFAULT_CONFIG, execute: true, artifacts_dir: dir };
    checker = new FakeSyntaxChecker();
    out = captureStream();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function deps(runtime: FakeRuntime): PipelineDeps {
    return { syntaxChecker: checker, runtime, reporter: new Reporter(out.stream) };
  }

  it('extracts, validates, assembles and runs a three-step guide', async () => {
    const runtime = new FakeRuntime({ exitCode: 0 }, file => fs.readFile(file, 'utf-8'));
    const report = await runPipeline({ htmlPath: fixture('three-steps.html'), config, runId: '1-1' }, deps(runtime));

    expect(report.commands.map(c => c.text)).toEqual([
      'wget https://example/key.asc -O key.asc',
      'gpg --import key.asc',
      'apt-get update && apt-get install -y pkg',
    ]);
    expect(report.findings.map(f => [f.severity, f.ruleId])).toEqual([
      ['warning', 'trusted-keyring'],
      ['warning', 'package-source'],
    ]);

    const script = runtime.scripts[0] ?? '';
    const prologueEnd = script.indexOf('apt-get install -y --no-install-recommends');
    const steps = ['# Step 1/3', '# Step 2/3', '# Step 3/3'].map(marker => script.indexOf(marker));
    const epilogue = script.indexOf('# Post-install verification');
    expect(prologueEnd).toBeGreaterThan(0);
    expect(steps).toEqual([...steps].sort((a, b) => a - b));
    expect(steps[0]).toBeGreaterThan(prologueEnd);
    expect(epilogue).toBeGreaterThan(steps[2] ?? Infinity);

    expect(report.execution).toMatchObject({ status: 'passed', exitCode: 0, preserved: false });
    expect(out.text().split('\n')).toEqual(
      expect.arrayContaining([
        'Extracted 3 unique commands:',
        '  1. wget https://example/key.asc -O key.asc',
        '  [PASS] required-pattern (2 warnings)',
        '  WARNING trusted-keyring: No command adds a trusted keyring',
        'Sandbox run: passed (exit 0)',
      ])
    );
  });

  it('fails with an empty extraction before any validation runs', async () => {
    const runtime = new FakeRuntime();
    const err = await rejection(runPipeline({ htmlPath: fixture('no-blocks.html'), config }, deps(runtime)));

    expect(err).toBeInstanceOf(GuideCheckError);
    expect(err).toMatchObject({ code: GuideCheckErrorCode.EXTRACTION_EMPTY, context: { stage: 'extract' } });
    expect(checker.checked).toEqual([]);
    expect(runtime.launches).toEqual([]);
  });

  it('reports a missing guide as an input error', async () => {
    const err = await rejection(runPipeline({ htmlPath: path.join(dir, 'missing.html'), config }, deps(new FakeRuntime())));
    expect(err).toMatchObject({ code: GuideCheckErrorCode.INPUT_NOT_FOUND });
  });

  it('stops on a blocking validation finding without assembling a script', async () => {
    const runtime = new FakeRuntime();
    const emitScriptPath = path.join(dir, 'emitted.sh');
    const err = await rejection(
      runPipeline({ htmlPath: fixture('dangerous.html'), config, emitScriptPath }, deps(runtime))
    );

    expect(err).toMatchObject({
      code: GuideCheckErrorCode.VALIDATION_FAILED,
      context: { stage: 'validate', ruleId: 'recursive-force-remove', commandIndex: 0 },
    });
    expect(runtime.launches).toEqual([]);
    expect(await exists(emitScriptPath)).toBe(false);
    expect(out.text()).toContain('  ERROR recursive-force-remove (command 1): Recursive forced removal: sudo rm -rf /var/lib/example\n');
  });

  it('stops on a syntax error', async () => {
    checker = new FakeSyntaxChecker(['gpg --import key.asc']);
    const err = await rejection(runPipeline({ htmlPath: fixture('three-steps.html'), config }, deps(new FakeRuntime())));
    expect(err).toMatchObject({
      code: GuideCheckErrorCode.VALIDATION_FAILED,
      context: { ruleId: 'shell-syntax', commandIndex: 1 },
    });
  });

  it('stops after validation in validate mode', async () => {
    const runtime = new FakeRuntime();
    const report = await runPipeline(
      { htmlPath: fixture('stable-guide.html'), config: { ...config, mode: 'validate' } },
      deps(runtime)
    );

    expect(report.commands).toHaveLength(6);
    expect(report.findings.map(f => [f.severity, f.ruleId, f.commandIndex])).toEqual([
      ['warning', 'key-verification-unconfigured', 2],
    ]);
    expect(report.script).toBeNull();
    expect(report.execution).toBeNull();
    expect(runtime.launches).toEqual([]);
  });

  it('warns that the fingerprint display goes unchecked without a configured fingerprint', async () => {
    const report = await runPipeline(
      { htmlPath: fixture('stable-guide.html'), config: { ...config, execute: false } },
      deps(new FakeRuntime())
    );

    expect(report.script?.segments[2]?.plan).toBe('verbatim');
    expect(out.text().split('\n')).toEqual(
      expect.arrayContaining([
        '  [PASS] key-verification (1 warning)',
        '  WARNING key-verification-unconfigured (command 3): Key fingerprint is displayed but not checked (no expected fingerprint configured): gpg --show-keys --with-colons repo-signing.asc | grep fpr',
      ])
    );
  });

  it('raises no key verification warning once a fingerprint is configured', async () => {
    const report = await runPipeline(
      {
        htmlPath: fixture('stable-guide.html'),
        config: { ...config, mode: 'validate', key_verification: { expected_fingerprint: FINGERPRINT, key_file: null } },
      },
      deps(new FakeRuntime())
    );
    expect(report.findings).toEqual([]);
    expect(out.text()).toContain('  [PASS] key-verification\n');
  });

  it('does not launch a container once interrupted', async () => {
    const abort = new AbortController();
    abort.abort();
    const runtime = new FakeRuntime();
    const err = await rejection(
      runPipeline({ htmlPath: fixture('three-steps.html'), config, signal: abort.signal }, deps(runtime))
    );

    expect(err).toMatchObject({
      code: GuideCheckErrorCode.EXECUTION_INTERRUPTED,
      message: 'Interrupted before the sandbox run started',
      context: { stage: 'execute' },
    });
    expect(runtime.launches).toEqual([]);
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('assembles without running when execution is disabled and writes the emitted script', async () => {
    const runtime = new FakeRuntime();
    const emitScriptPath = path.join(dir, 'install.sh');
    const report = await runPipeline(
      {
        htmlPath: fixture('stable-guide.html'),
        config: { ...config, execute: false, key_verification: { expected_fingerprint: FINGERPRINT, key_file: null } },
        emitScriptPath,
        runId: '9-9',
      },
      deps(runtime)
    );

    expect(report.script?.segments.map(s => s.plan)).toEqual([
      'prerequisite-noop',
      'verbatim',
      'key-verification',
      'verbatim',
      'verbatim',
      'verbatim',
    ]);
    expect(await fs.readFile(emitScriptPath, 'utf-8')).toBe(report.script?.text);
    expect(report.script?.text).toContain('# Source: stable-guide.html\n');
    expect(report.script?.text).toContain(`EXPECTED_FINGERPRINT="${FINGERPRINT}"\n`);
    expect(report.execution).toBeNull();
    expect(runtime.launches).toEqual([]);
  });

  it('leaves nothing behind after a passing run', async () => {
    const runtime = new FakeRuntime({ exitCode: 0 });
    const report = await runPipeline({ htmlPath: fixture('three-steps.html'), config, runId: '5-5' }, deps(runtime));

    expect(runtime.destroyed).toEqual(['install-guide-check-5-5']);
    expect(report.execution?.preserved).toBe(false);
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('preserves the script and the instance after a failing run and reports them', async () => {
    const runtime = new FakeRuntime({ exitCode: 1, output: 'E: Unable to locate package pkg\n' });
    const err = await rejection(
      runPipeline({ htmlPath: fixture('three-steps.html'), config, runId: '6-6' }, deps(runtime))
    );
    const scriptPath = path.join(dir, 'install-guide-check-6-6.sh');

    expect(err).toMatchObject({
      code: GuideCheckErrorCode.EXECUTION_FAILED,
      context: { stage: 'execute', exitCode: 1, instanceId: 'install-guide-check-6-6', scriptPath },
    });
    expect(runtime.destroyed).toEqual([]);
    expect((await fs.readdir(dir)).sort()).toEqual(['install-guide-check-6-6.sh', 'install-guide-check-6-6.sh.log']);
    expect(out.text()).toContain('  instance preserved: install-guide-check-6-6\n');
    expect(out.text()).toContain(`  script preserved:   ${scriptPath}\n`);
  });

  it.each([
    [{ timedOut: true, exitCode: 137 }, GuideCheckErrorCode.EXECUTION_TIMEOUT],
    [{ interrupted: true, exitCode: 130 }, GuideCheckErrorCode.EXECUTION_INTERRUPTED],
  ])('maps %j to %s', async (outcome, code) => {
    const err = await rejection(
      runPipeline({ htmlPath: fixture('three-steps.html'), config }, deps(new FakeRuntime(outcome)))
    );
    expect(err).toMatchObject({ code });
  });

  it('maps a launch failure to its own code', async () => {
    const runtime = new FakeRuntime(new GuideCheckError(GuideCheckErrorCode.EXECUTION_LAUNCH_FAILED, 'Could not run docker'));
    const err = await rejection(runPipeline({ htmlPath: fixture('three-steps.html'), config }, deps(runtime)));
    expect(err).toMatchObject({
      code: GuideCheckErrorCode.EXECUTION_LAUNCH_FAILED,
      context: { stage: 'execute', exitCode: null, cause: 'Could not run docker' },
    });
  });
});

describe('extractCommands', () => {
  it('yields the de-duplicated commands of a full guide in document order', async () => {
    const html = await fs.readFile(fixture('stable-guide.html'), 'utf-8');
    const commands = extractCommands(html, DEFAULT_CONFIG);

    expect(commands.map(c => c.text)).toEqual([
      'sudo apt-get install -y curl gnupg',
      'curl -fsSL https://packages.example.org/repo-signing.asc -o repo-signing.asc',
      'gpg --show-keys --with-colons repo-signing.asc | grep fpr',
      'sudo gpg --dearmor -o /usr/share/keyrings/example-archive.gpg repo-signing.asc',
      'echo "deb [signed-by=/usr/share/keyrings/example-archive.gpg] https://packages.example.org focal stable" | sudo tee /etc/apt/sources.list.d/example.list',
      'sudo apt-get update && sudo apt-get install -y example-daemon',
    ]);
    expect(commands.map(c => c.index)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(commands[0]?.origin).toEqual({ startLine: 8, endLine: 10 });
  });
});
