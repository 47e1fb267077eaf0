import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { deploymentPaths, type Config, type DeploymentProfile } from '../cli-config.js';
import { FixedAnswerPrompt } from '../confirmation.js';
import { EnvironmentStore } from '../environment-store.js';
import { ComposeError } from '../errors.js';
import { CLEAN_QUESTION, LifecycleController, createPathRemover } from '../lifecycle.js';
import type { ComposeDriver, DownOptions, ServiceStatus } from '../../platforms/compose.js';
import type { ProcessRunner } from '../../platforms/process-runner.js';

class FakeCompose implements ComposeDriver {
  readonly calls: string[] = [];
  statuses: ServiceStatus[] = [
    { service: 'db', container: 'postgres', state: 'running', health: 'healthy', exitCode: 0 },
    { service: 'dbinit', container: 'dbinit', state: 'exited', health: '', exitCode: 0 },
    { service: 'kcidb-rest', container: 'kcidb-rest', state: 'running', health: '', exitCode: 0 },
  ];
  upError: Error | null = null;
  psError: Error | null = null;

  async up(profile: DeploymentProfile): Promise<void> {
    this.calls.push(`up ${profile}`);
    if (this.upError) throw this.upError;
  }

  async down(profile: DeploymentProfile, options: DownOptions = {}): Promise<void> {
    const flags = [options.volumes ? ' volumes' : '', options.removeOrphans ? ' orphans' : ''].join('');
    this.calls.push(`down ${profile}${flags}`);
  }

  async ps(profile: DeploymentProfile): Promise<ServiceStatus[]> {
    this.calls.push(`ps ${profile}`);
    if (this.psError) throw this.psError;
    return this.statuses;
  }
}

describe('LifecycleController', () => {
  let dir: string;
  let config: Config;
  let compose: FakeCompose;
  let removed: string[];
  let generated: number;

  function createController(answer = 'y'): { controller: LifecycleController; prompt: FixedAnswerPrompt } {
    const prompt = new FixedAnswerPrompt(answer);
    const controller = new LifecycleController({
      config,
      compose,
      store: new EnvironmentStore(config.paths.envFile, {
        lockFile: config.paths.lockFile,
        generateSecret: () => `test-secret-${++generated}`,
      }),
      prompt,
      removePath: async (target) => {
        removed.push(target);
        fs.rmSync(target, { recursive: true, force: true });
      },
    });
    return { controller, prompt };
  }

  function envLines(): string[] {
    return fs.readFileSync(config.paths.envFile, 'utf-8').trimEnd().split('\n');
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kcidb-lifecycle-'));
    fs.writeFileSync(path.join(dir, 'docker-compose.yaml'), 'services: {}\n');
    config = {
      projectRoot: dir,
      profile: 'self-hosted',
      runtime: 'docker',
      paths: deploymentPaths(dir),
      verbose: false,
      quiet: false,
    };
    compose = new FakeCompose();
    removed = [];
    generated = 0;
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('run', () => {
    it('creates configuration, starts the profile and reports health', async () => {
      const { controller } = createController();

      const report = await controller.run();

      expect(report.envCreated).toBe(true);
      expect(report.secretRotated).toBe(false);
      expect(report.workerConfig).toBe('seeded-from-bundle');
      expect(report.warnings).toEqual([]);
      expect(report.health?.health).toBe('healthy');
      expect(compose.calls).toEqual(['up self-hosted', 'ps self-hosted']);
      expect(controller.state).toBe('running');
      expect(fs.existsSync(config.paths.workerConfig)).toBe(true);
    });

    it('prefers the template shipped in the project', async () => {
      fs.mkdirSync(path.dirname(config.paths.workerTemplate), { recursive: true });
      fs.writeFileSync(config.paths.workerTemplate, 'maestro:\n  type: build\n');

      const report = await createController().controller.run();

      expect(report.workerConfig).toBe('seeded-from-project');
      expect(fs.readFileSync(config.paths.workerConfig, 'utf-8')).toBe('maestro:\n  type: build\n');
    });

    it('is idempotent across run, down, run', async () => {
      const { controller } = createController();

      await controller.run();
      const afterFirst = fs.readFileSync(config.paths.envFile, 'utf-8');
      await controller.down();
      const second = await controller.run();

      expect(second.envCreated).toBe(false);
      expect(second.repairedKeys).toEqual([]);
      expect(second.secretRotated).toBe(false);
      expect(second.workerConfig).toBe('kept');
      expect(fs.readFileSync(config.paths.envFile, 'utf-8')).toBe(afterFirst);
      expect(envLines().filter(line => line.startsWith('JWT_SECRET='))).toEqual(['JWT_SECRET=test-secret-1']);
      expect(compose.calls).toEqual(['up self-hosted', 'ps self-hosted', 'down self-hosted', 'up self-hosted', 'ps self-hosted']);
    });

    it('replaces a placeholder secret in an existing file', async () => {
      fs.writeFileSync(config.paths.envFile, 'POSTGRES_PASSWORD=kcidb\nJWT_SECRET=change-me\n');

      const report = await createController().controller.run();

      expect(report.secretRotated).toBe(true);
      expect(report.repairedKeys).toEqual(['PS_PASS', 'PG_URI']);
      expect(envLines()).toContain('JWT_SECRET=test-secret-1');
    });

    it('writes certificate keys only while certificate mode is selected', async () => {
      const { controller } = createController();

      const withCert = await controller.run({
        certificate: { domain: 'kcidb.example.org', email: 'admin@example.org' },
      });
      expect(withCert.certificateKeys).toEqual({ set: ['CERTBOT_DOMAIN', 'CERTBOT_EMAIL'], pruned: [] });
      expect(envLines()).toContain('CERTBOT_DOMAIN=kcidb.example.org');

      const withoutCert = await controller.run();
      expect(withoutCert.certificateKeys).toEqual({ set: [], pruned: ['CERTBOT_DOMAIN', 'CERTBOT_EMAIL'] });
      expect(envLines().some(line => line.startsWith('CERTBOT_'))).toBe(false);
    });

    it('prunes the email when only a domain is given', async () => {
      fs.writeFileSync(config.paths.envFile, 'CERTBOT_DOMAIN=old.example.org\nCERTBOT_EMAIL=admin@example.org\n');

      const report = await createController().controller.run({ certificate: { domain: 'kcidb.example.org' } });

      expect(report.certificateKeys).toEqual({ set: ['CERTBOT_DOMAIN'], pruned: ['CERTBOT_EMAIL'] });
    });

    it('surfaces compose failures and does not seed the worker configuration', async () => {
      compose.upError = new ComposeError('docker compose --profile=self-hosted up -d --build', 1, 'no such image');
      const { controller } = createController();

      await expect(controller.run()).rejects.toBeInstanceOf(ComposeError);
      expect(controller.state).toBe('absent');
      expect(fs.existsSync(config.paths.workerConfig)).toBe(false);
      expect(fs.existsSync(config.paths.envFile)).toBe(true);
    });

    it('warns about an invalid worker configuration and keeps it', async () => {
      fs.mkdirSync(path.dirname(config.paths.workerConfig), { recursive: true });
      fs.writeFileSync(config.paths.workerConfig, 'maestro:\n  type: nightly\n');

      const report = await createController().controller.run();

      expect(report.workerConfig).toBe('kept');
      expect(report.warnings).toHaveLength(1);
      expect(report.warnings[0]).toMatch(/^Invalid worker configuration: maestro/);
      expect(fs.readFileSync(config.paths.workerConfig, 'utf-8')).toBe('maestro:\n  type: nightly\n');
    });

    it('still succeeds when service status cannot be read', async () => {
      compose.psError = new Error('ps unsupported');

      const report = await createController().controller.run();

      expect(report.health).toBeNull();
      expect(report.warnings).toEqual(['Could not read service status: ps unsupported']);
    });

    it('reports a degraded deployment when a service failed', async () => {
      compose.statuses = [
        { service: 'db', container: 'postgres', state: 'running', health: 'healthy', exitCode: 0 },
        { service: 'dbinit', container: 'dbinit', state: 'exited', health: '', exitCode: 2 },
      ];

      const report = await createController().controller.run();

      expect(report.health?.health).toBe('degraded');
    });
  });

  describe('down', () => {
    it('keeps volumes, configuration and data', async () => {
      const { controller } = createController();
      await controller.run();
      fs.mkdirSync(path.join(dir, 'db'));

      await controller.down();

      expect(compose.calls.at(-1)).toBe('down self-hosted');
      expect(controller.state).toBe('absent');
      expect(fs.existsSync(config.paths.envFile)).toBe(true);
      expect(fs.existsSync(path.join(dir, 'db'))).toBe(true);
    });
  });

  describe('clean', () => {
    it.each(['n', 'N', '', 'yes', 'no'])('does nothing when the answer is %j', async (answer) => {
      const { controller, prompt } = createController(answer);
      fs.writeFileSync(config.paths.envFile, 'A=1\n');

      const report = await controller.clean();

      expect(report).toEqual({ status: 'cancelled' });
      expect(prompt.questions).toEqual([CLEAN_QUESTION]);
      expect(compose.calls).toEqual([]);
      expect(fs.existsSync(config.paths.envFile)).toBe(true);
    });

    it('removes containers, volumes, configuration and data on y', async () => {
      const { controller } = createController('y');
      await controller.run();
      const dataDir = path.join(dir, 'db');
      fs.mkdirSync(dataDir);
      fs.writeFileSync(path.join(dataDir, 'PG_VERSION'), '16\n');

      const report = await controller.clean();

      expect(report).toEqual({
        status: 'destroyed',
        removed: [config.paths.envFile, config.paths.workerConfig, dataDir],
      });
      expect(compose.calls.at(-1)).toBe('down self-hosted volumes orphans');
      expect(removed).toEqual([config.paths.workerConfig, dataDir]);
      expect(fs.existsSync(config.paths.envFile)).toBe(false);
      expect(fs.existsSync(config.paths.workerConfig)).toBe(false);
      expect(controller.state).toBe('absent');
    });

    it('empties the config directory and removes generated worker files', async () => {
      const { controller } = createController('y');
      await controller.run();
      const proxyCredentials = path.join(dir, 'config', 'db.json');
      fs.writeFileSync(proxyCredentials, '{"type":"service_account"}\n');
      const generatedWorkerFile = path.join(dir, 'logspec-worker', 'logspec_worker.yaml');
      fs.mkdirSync(path.dirname(config.paths.workerTemplate), { recursive: true });
      fs.writeFileSync(config.paths.workerTemplate, 'maestro:\n  type: build\n');
      fs.writeFileSync(generatedWorkerFile, 'maestro:\n  type: build\n');

      const report = await controller.clean();

      expect(removed).toEqual([proxyCredentials, config.paths.workerConfig, generatedWorkerFile]);
      expect(report).toEqual({
        status: 'destroyed',
        removed: [config.paths.envFile, proxyCredentials, config.paths.workerConfig, generatedWorkerFile],
      });
      expect(fs.readdirSync(config.paths.configDirectory)).toEqual([]);
      expect(fs.existsSync(config.paths.workerTemplate)).toBe(true);
    });

    it('accepts an upper-case Y', async () => {
      const report = await createController('Y').controller.clean();

      expect(report).toEqual({ status: 'destroyed', removed: [] });
    });
  });
});

describe('createPathRemover', () => {
  it('deletes through sudo when the runtime needs it', async () => {
    const run = vi.fn<ProcessRunner>().mockResolvedValue({ exitCode: 0, stdout: '', stderr: '' });
    const remove = createPathRemover({ runtime: 'docker', privilege: 'escalated' }, run);

    await remove('/srv/kcidb/db');

    expect(run).toHaveBeenCalledWith('sudo', ['rm', '-rf', '/srv/kcidb/db'], { stdio: 'pipe', stdin: 'inherit' });
  });

  it('fails when sudo rm fails', async () => {
    const run = vi.fn<ProcessRunner>().mockResolvedValue({ exitCode: 1, stdout: '', stderr: 'permission denied' });
    const remove = createPathRemover({ runtime: 'docker', privilege: 'escalated' }, run);

    await expect(remove('/srv/kcidb/db')).rejects.toBeInstanceOf(ComposeError);
  });

  it('deletes directly otherwise', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kcidb-remove-'));
    fs.writeFileSync(path.join(dir, 'file'), 'x');
    const run = vi.fn<ProcessRunner>();

    await createPathRemover({ runtime: 'docker', privilege: 'direct' }, run)(dir);

    expect(fs.existsSync(dir)).toBe(false);
    expect(run).not.toHaveBeenCalled();
  });
});
