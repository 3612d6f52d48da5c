import { describe, it, beforeEach, afterEach } from 'mocha';
import { strict as assert } from 'assert';
import * as fs from 'fs';
import * as path from 'path';
import { ConsoleStateMachine } from '../../../src/console/console-state-machine';
import { SetupFlow } from '../../../src/console/setup-flow';
import { createHarness, type ConsoleHarness } from '../../helpers/console-harness';
import { ALL_PROBES, DISCOVER_ALL_ANSWERS } from '../../helpers/setup-answers';
import type { ScriptedAnswer } from '../../helpers/scripted-prompter';
import { makeTempDir, removeTempDir } from '../../helpers/temp-dir';

const MENU = 'Choice [1-9]: ';
const EXIT: ScriptedAnswer = { match: MENU, answer: '9' };

const MINIMAL_ENV = [
  '# Feeder configuration',
  'FEEDER_LAT=40.6892',
  'FEEDER_LONG=-74.0445',
  'RADARBOX_KEY=YOUR-RADARBOX-KEY',
  '',
].join('\n');

function withMinimalEnv(harness: ConsoleHarness): ConsoleHarness {
  fs.writeFileSync(harness.config.envFile, MINIMAL_ENV);
  return harness;
}

function transitions(harness: ConsoleHarness): string[] {
  return harness.logger.getByCategory('TRANSITION').map((entry) => entry.message);
}

describe('ConsoleStateMachine', function () {
  this.timeout(10000);

  let installDir: string;

  beforeEach(() => {
    installDir = makeTempDir('console');
  });

  afterEach(() => removeTempDir(installDir));

  describe('initial state', () => {
    it('should start in Fresh without configuration and in the menu with one', async () => {
      const empty = createHarness(installDir, []);
      assert.equal(await new ConsoleStateMachine(empty.services).determineInitialState(), 'Fresh');

      const configured = withMinimalEnv(createHarness(installDir, []));
      assert.equal(await new ConsoleStateMachine(configured.services).determineInitialState(), 'MaintenanceMenu');
    });

    it('should exit by default on an unreadable configuration', async () => {
      const harness = createHarness(installDir, [{ match: 'Choice [1-2] [2]: ', answer: '' }]);
      fs.writeFileSync(harness.config.envFile, 'FEEDER_LAT=40.6892\nnot a valid line\n');

      assert.equal(await new ConsoleStateMachine(harness.services).determineInitialState(), 'Exit');
      assert.ok(harness.output.getLines().includes('✗ [E101] Configuration file is unreadable: ' + harness.config.envFile + ' line 2'));
      assert.equal(harness.services.store.exists(), true);
    });

    it('should back up an unreadable configuration before starting over', async () => {
      const harness = createHarness(installDir, [{ match: 'Choice [1-2] [2]: ', answer: '1' }]);
      fs.writeFileSync(harness.config.envFile, 'not a valid line\n');

      assert.equal(await new ConsoleStateMachine(harness.services).determineInitialState(), 'Fresh');

      const backups = harness.services.store.listBackups();
      assert.equal(backups.length, 1);
      assert.equal(fs.readFileSync(backups[0], 'utf-8'), 'not a valid line\n');
      assert.equal(harness.services.store.exists(), false);
    });
  });

  it('should run a fresh setup into the menu and regenerate an identical artifact', async () => {
    const harness = createHarness(
      installDir,
      [
        ...DISCOVER_ALL_ANSWERS,
        { match: 'Start all feeders now?', answer: 'n' },
        { match: MENU, answer: '6' },
        EXIT,
      ],
      ALL_PROBES
    );
    const machine = new ConsoleStateMachine(harness.services);

    const ctx = await machine.run(harness.ctx);

    assert.equal(machine.getState(), 'Exit');
    assert.equal(ctx.setupRuns, 1);
    assert.ok(
      harness.output.getLines().includes(`✓ Dashboard config already up to date: ${harness.config.artifactFile}`)
    );
    assert.deepEqual(transitions(harness), [
      'Fresh -> MaintenanceMenu',
      'MaintenanceMenu -> MaintenanceMenu',
      'MaintenanceMenu -> Exit',
    ]);
  });

  it('should back up and keep every value when reconfiguring without changes', async () => {
    const first = createHarness(
      installDir,
      [...DISCOVER_ALL_ANSWERS, { match: 'Start all feeders now?', answer: 'n' }],
      ALL_PROBES
    );
    await new SetupFlow(first.services).run(first.ctx, 'fresh');
    const before = fs.readFileSync(first.config.envFile, 'utf-8');

    const harness = createHarness(installDir, [
      { match: MENU, answer: '2' },
      { match: 'Keep this location? (Y/n): ', answer: '' },
      { match: 'Have you set up ADS-B feeding before?', answer: '' },
      { match: 'Keep it? (Y/n): ', answer: '' },
      { match: 'Keep it? (Y/n): ', answer: '' },
      { match: 'Keep it? (Y/n): ', answer: '' },
      { match: 'Start all feeders now?', answer: 'n' },
      EXIT,
    ]);
    await new ConsoleStateMachine(harness.services).run(harness.ctx, 'MaintenanceMenu');

    assert.equal(harness.prompter.remaining(), 0);
    assert.equal(fs.readFileSync(harness.config.envFile, 'utf-8'), before);
    const backups = harness.services.store.listBackups();
    assert.equal(backups.length, 1);
    assert.equal(fs.readFileSync(backups[0], 'utf-8'), before);
    assert.ok(harness.output.getLines().includes(`✓ Dashboard config unchanged: ${harness.config.artifactFile}`));
    assert.equal(harness.launcher.launched.length, 0);
  });

  describe('menu actions', () => {
    it('should regenerate the artifact before restarting all services', async () => {
      const harness = withMinimalEnv(createHarness(installDir, [{ match: MENU, answer: '1' }, EXIT]));

      await new ConsoleStateMachine(harness.services).run(harness.ctx, 'MaintenanceMenu');

      assert.deepEqual(harness.runner.commandLines(), ['docker compose restart']);
      assert.equal(fs.existsSync(harness.config.artifactFile), true);
      assert.ok(harness.output.getLines().includes('✓ Services restarted'));
    });

    it('should report a runtime failure and stay in the menu', async () => {
      const harness = withMinimalEnv(createHarness(installDir, [{ match: MENU, answer: '3' }, EXIT]));
      harness.runner.when(['stop'], { exitCode: 1, stderr: 'Cannot connect to the Docker daemon\n' });

      const ctx = await new ConsoleStateMachine(harness.services).run(harness.ctx, 'MaintenanceMenu');

      const message = '[E301] Container runtime operation failed: Cannot connect to the Docker daemon';
      assert.equal(ctx.lastError, message);
      assert.ok(harness.output.getLines().includes(`✗ ${message}`));
      assert.deepEqual(transitions(harness), ['MaintenanceMenu -> MaintenanceMenu', 'MaintenanceMenu -> Exit']);
    });

    it('should show stored values and derived credential validity', async () => {
      const harness = withMinimalEnv(
        createHarness(installDir, [{ match: MENU, answer: '7' }, { match: 'Press Enter', answer: '' }, EXIT])
      );

      await new ConsoleStateMachine(harness.services).run(harness.ctx, 'MaintenanceMenu');

      const lines = harness.output.getLines();
      assert.ok(lines.includes('RADARBOX_KEY=YOUR-RADARBOX-KEY'));
      assert.ok(lines.includes('  RADARBOX_KEY: unverified (placeholder)'));
      assert.ok(lines.includes('  FR24KEY: unverified (placeholder)'));
    });

    it('should pull and recreate when updating images', async () => {
      const harness = withMinimalEnv(
        createHarness(installDir, [{ match: MENU, answer: '5' }, { match: 'Choice [1-3]: ', answer: '1' }, EXIT])
      );

      await new ConsoleStateMachine(harness.services).run(harness.ctx, 'MaintenanceMenu');

      assert.deepEqual(harness.runner.commandLines(), ['docker compose pull', 'docker compose up -d --remove-orphans']);
    });

    it('should refuse a source update outside a git clone', async () => {
      const harness = withMinimalEnv(
        createHarness(installDir, [{ match: MENU, answer: '5' }, { match: 'Choice [1-3]: ', answer: '2' }, EXIT])
      );

      await new ConsoleStateMachine(harness.services).run(harness.ctx, 'MaintenanceMenu');

      assert.ok(
        harness.output.getLines().includes(`✗ [E303] Source update failed: ${installDir} is not a git clone`)
      );
      assert.deepEqual(harness.runner.calls, []);
    });
  });

  describe('log views', () => {
    it('should follow live logs until interrupted', async () => {
      const harness = withMinimalEnv(
        createHarness(installDir, [
          { match: 'Choice [1-7]: ', answer: '5' },
          { match: 'Choice [1-6]: ', answer: '6' },
          EXIT,
        ])
      );
      harness.runner.followLines = ['piaware | connected to FlightAware'];
      setTimeout(() => harness.interrupts.interrupt(), 20);

      await new ConsoleStateMachine(harness.services).run(harness.ctx, 'LiveLogs');

      assert.deepEqual(harness.runner.commandLines(), ['docker compose logs -f --tail 20 piaware']);
      assert.ok(harness.output.getLines().includes('piaware | connected to FlightAware'));
      assert.equal(harness.interrupts.isActive(), false);
    });

    it('should restart a single service after regenerating for the dashboard', async () => {
      const harness = withMinimalEnv(
        createHarness(installDir, [
          { match: 'Choice [1-7]: ', answer: '6' },
          { match: 'Choice [1-6]: ', answer: '6' },
          EXIT,
        ])
      );

      await new ConsoleStateMachine(harness.services).run(harness.ctx, 'RestartService');

      assert.deepEqual(harness.runner.commandLines(), ['docker compose restart dashboard']);
      assert.ok(harness.output.getLines().includes('✓ Dashboard config regenerated'));
    });
  });

  describe('uninstall', () => {
    it('should remove services, data and configuration but keep backups', async () => {
      const harness = withMinimalEnv(
        createHarness(installDir, [
          { match: 'Are you sure you want to uninstall? (type "yes" to continue): ', answer: 'yes' },
          { match: 'Stop and remove all managed services? (Y/n): ', answer: '' },
          { match: 'Also remove data directory', answer: 'y' },
          { match: 'Also remove configuration', answer: 'y' },
        ])
      );
      fs.mkdirSync(harness.config.dataDir, { recursive: true });
      fs.writeFileSync(path.join(harness.config.dataDir, 'state.json'), '{}');
      fs.writeFileSync(harness.config.artifactFile, 'window.FEEDER_CONFIG = {};\n');
      const machine = new ConsoleStateMachine(harness.services);

      await machine.run(harness.ctx, 'Uninstall');

      assert.equal(machine.getState(), 'Exit');
      assert.deepEqual(harness.runner.commandLines(), ['docker compose down --remove-orphans']);
      assert.equal(fs.existsSync(harness.config.dataDir), false);
      assert.equal(fs.existsSync(harness.config.envFile), false);
      assert.equal(fs.existsSync(harness.config.artifactFile), false);
      const backups = harness.services.store.listBackups();
      assert.equal(backups.length, 1);
      assert.equal(fs.readFileSync(backups[0], 'utf-8'), MINIMAL_ENV);
    });

    it('should back up the configuration before removing anything', async () => {
      const harness = withMinimalEnv(
        createHarness(installDir, [
          { match: 'Are you sure you want to uninstall? (type "yes" to continue): ', answer: 'yes' },
          { match: 'Stop and remove all managed services? (Y/n): ', answer: 'y' },
          { match: 'Also remove data directory', answer: 'n' },
          { match: 'Also remove configuration', answer: 'n' },
          EXIT,
        ])
      );
      const machine = new ConsoleStateMachine(harness.services);

      await machine.run(harness.ctx, 'Uninstall');

      const backups = harness.services.store.listBackups();
      assert.equal(backups.length, 1);
      assert.equal(fs.readFileSync(backups[0], 'utf-8'), MINIMAL_ENV);
      assert.equal(fs.readFileSync(harness.config.envFile, 'utf-8'), MINIMAL_ENV);
      const lines = harness.output.getLines();
      const backedUp = lines.indexOf(`✓ Configuration backed up to ${backups[0]}`);
      assert.ok(backedUp >= 0);
      assert.ok(backedUp < lines.indexOf('✓ Managed services removed'));
      assert.deepEqual(harness.runner.commandLines(), ['docker compose down --remove-orphans']);
    });

    it('should change nothing unless the operator types yes', async () => {
      const harness = withMinimalEnv(
        createHarness(installDir, [{ match: 'Are you sure you want to uninstall?', answer: 'y' }, EXIT])
      );

      await new ConsoleStateMachine(harness.services).run(harness.ctx, 'Uninstall');

      assert.ok(harness.output.getLines().includes('⚠ Operation cancelled: confirmation not given'));
      assert.deepEqual(harness.runner.calls, []);
      assert.equal(fs.readFileSync(harness.config.envFile, 'utf-8'), MINIMAL_ENV);
    });
  });

  it('should end the session on Ctrl+C at a prompt', async () => {
    const harness = withMinimalEnv(createHarness(installDir, []));
    const machine = new ConsoleStateMachine(harness.services);

    await machine.run(harness.ctx, 'MaintenanceMenu');

    assert.equal(machine.getState(), 'Exit');
    assert.deepEqual(transitions(harness), ['MaintenanceMenu -> Exit']);
  });
});
