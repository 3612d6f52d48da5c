/**
 * Console State Machine
 *
 * Drives the operator console. Menu states follow the transition table;
 * flow states (Fresh, Reconfigure, log views, Uninstall) run their flow and
 * name the next state. A failure inside a state is reported with its hint and
 * the machine falls back to the nearest menu instead of ending the session.
 */

import type { ServiceSelection } from '../runtime/lifecycle-controller';
import { ConsoleError, describeError, isConsoleError } from '../errors/console-error';
import { ErrorCode, getErrorMessage, getRemediationHint } from '../errors/error-codes';
import { regenerateFromStore } from '../store/config-commit';
import { readCredentials } from '../store/credentials';
import { serializeEnv } from '../store/env-file';
import type { ConsoleServices } from './console-services';
import { PromptInterruptedError } from './prompter';
import type { SessionContext } from './session-context';
import { SetupFlow } from './setup-flow';
import {
  MENU_TITLES,
  TRANSITIONS,
  isMenuState,
  transition,
  type ConsoleAction,
  type ConsoleState,
} from './transitions';

export interface StepResult {
  ctx: SessionContext;
  next: ConsoleState;
  choice?: string;
}

type ActionHandler = (ctx: SessionContext) => Promise<SessionContext>;

const ALL = '__all';
const BACK = '__back';

export class ConsoleStateMachine {
  private readonly setup: SetupFlow;
  private readonly actions: Record<ConsoleAction, ActionHandler>;
  private state: ConsoleState = 'Exit';

  constructor(private readonly services: ConsoleServices) {
    this.setup = new SetupFlow(services);
    this.actions = {
      restartAll: (ctx) => this.restartAll(ctx),
      stopAll: (ctx) => this.stopAll(ctx),
      regenerate: (ctx) => this.regenerate(ctx),
      showConfiguration: (ctx) => this.showConfiguration(ctx),
      showStatus: (ctx) => this.showStatus(ctx),
      showErrors: (ctx) => this.showErrors(ctx),
      updateImages: (ctx) => this.updateImages(ctx),
      updateSource: (ctx) => this.updateSource(ctx),
    };
  }

  getState(): ConsoleState {
    return this.state;
  }

  /**
   * Fresh without configuration, MaintenanceMenu with one. An unreadable
   * configuration forces a decision: back it up and start over, or exit.
   */
  async determineInitialState(): Promise<ConsoleState> {
    const { store, output, prompts } = this.services;
    try {
      return store.load() ? 'MaintenanceMenu' : 'Fresh';
    } catch (error) {
      if (!isConsoleError(error, ErrorCode.E101_MALFORMED_CONFIGURATION)) {
        throw error;
      }
      output.fail(error);
      const choice = await prompts.choose('What now?', [
        { value: 'fresh', label: 'Back up the unreadable file and start a fresh setup' },
        { value: 'exit', label: 'Exit (fix .env by hand)' },
      ] as const, 'exit');
      if (choice === 'exit') {
        return 'Exit';
      }
      const backup = store.remove();
      if (backup) {
        output.ok(`Unreadable configuration backed up to ${backup.path}`);
      }
      return 'Fresh';
    }
  }

  /**
   * Run until Exit
   */
  async run(ctx: SessionContext, initial?: ConsoleState): Promise<SessionContext> {
    let session = ctx;
    try {
      this.state = initial ?? (await this.determineInitialState());
    } catch (error) {
      if (error instanceof PromptInterruptedError) {
        this.state = 'Exit';
        return session;
      }
      throw error;
    }

    while (this.state !== 'Exit') {
      const from = this.state;
      let choice: string | undefined;
      try {
        const result = await this.step(from, session);
        session = result.ctx;
        choice = result.choice;
        this.state = result.next;
      } catch (error) {
        if (error instanceof PromptInterruptedError) {
          this.state = 'Exit';
        } else {
          this.services.output.fail(error);
          this.services.logger.logError(`${from} failed`, error);
          session = { ...session, lastError: describeError(error) };
          this.state = this.recoveryState(from);
        }
      }
      this.services.logger.logTransition(from, this.state, choice);
    }
    return session;
  }

  /**
   * Execute one state
   */
  async step(state: ConsoleState, ctx: SessionContext): Promise<StepResult> {
    if (isMenuState(state)) {
      this.services.output.heading(MENU_TITLES[state]);
      const choice = await this.services.prompts.choose(
        'Select an option:',
        TRANSITIONS[state].map((t) => ({ value: t.choice, label: t.label }))
      );
      const selected = transition(state, choice);
      const next = selected.action ? await this.actions[selected.action](ctx) : ctx;
      return { ctx: next, next: selected.next, choice };
    }

    switch (state) {
      case 'Fresh': {
        const next = await this.setup.run(ctx, 'fresh');
        return { ctx: next, next: this.services.store.exists() ? 'MaintenanceMenu' : 'Exit' };
      }
      case 'Reconfigure':
        return { ctx: await this.reconfigure(ctx), next: 'MaintenanceMenu' };
      case 'LogView':
        return { ctx: await this.logView(ctx), next: 'StatusAndLogs' };
      case 'LiveLogs':
        return { ctx: await this.liveLogs(ctx), next: 'StatusAndLogs' };
      case 'RestartService':
        return { ctx: await this.restartService(ctx), next: 'StatusAndLogs' };
      case 'Uninstall':
        return this.uninstall(ctx);
      default:
        throw new ConsoleError(ErrorCode.E401_INVALID_TRANSITION, state);
    }
  }

  private recoveryState(from: ConsoleState): ConsoleState {
    switch (from) {
      case 'Fresh':
        return this.services.store.exists() ? 'MaintenanceMenu' : 'Exit';
      case 'LogView':
      case 'LiveLogs':
      case 'RestartService':
        return 'StatusAndLogs';
      case 'MaintenanceMenu':
      case 'StatusAndLogs':
        return from;
      default:
        return 'MaintenanceMenu';
    }
  }

  // --- flow states ---------------------------------------------------------

  private async reconfigure(ctx: SessionContext): Promise<SessionContext> {
    const { store, output } = this.services;
    const current = store.load();
    if (current) {
      const backup = store.backup(current, 'reconfigure');
      output.ok(`Current configuration backed up to ${backup.path}`);
    }
    return this.setup.run(ctx, 'reconfigure');
  }

  private async chooseServices(ctx: SessionContext, title: string): Promise<ServiceSelection | undefined> {
    const choice = await this.services.prompts.choose(title, [
      { value: ALL, label: 'All services' },
      ...ctx.catalog.services.map((s) => ({ value: s.name, label: s.label })),
      { value: BACK, label: 'Back' },
    ]);
    if (choice === BACK) {
      return undefined;
    }
    return choice === ALL ? 'all' : [choice];
  }

  private async logView(ctx: SessionContext): Promise<SessionContext> {
    const selection = await this.chooseServices(ctx, 'Which logs?');
    if (!selection) {
      return ctx;
    }
    const lines = await this.services.lifecycle.logs(selection, { tail: 50 });
    this.services.output.heading(`${selection === 'all' ? 'All services' : selection.join(', ')}: last 50 lines`);
    lines.forEach((line) => this.services.output.line(line));
    await this.services.prompts.pause();
    return ctx;
  }

  private async liveLogs(ctx: SessionContext): Promise<SessionContext> {
    const { output, interrupts, lifecycle } = this.services;
    const selection = await this.chooseServices(ctx, 'Which service?');
    if (!selection) {
      return ctx;
    }
    output.heading('Live logs (Ctrl+C to stop)');
    const signal = interrupts.begin();
    try {
      await lifecycle.follow(selection, signal, (line) => output.line(line));
    } finally {
      interrupts.end();
    }
    output.line();
    return ctx;
  }

  private async restartService(ctx: SessionContext): Promise<SessionContext> {
    const { output, lifecycle, store, artifacts } = this.services;
    const selection = await this.chooseServices(ctx, 'Restart which service?');
    if (!selection) {
      return ctx;
    }
    const readsArtifact = ctx.catalog.services.some(
      (service) => service.readsArtifact && (selection === 'all' || selection.includes(service.name))
    );
    if (readsArtifact && regenerateFromStore({ store, artifacts })) {
      output.ok('Dashboard config regenerated');
    }
    await lifecycle.restart(selection);
    output.ok(`Restarted ${selection === 'all' ? 'all services' : selection.join(', ')}`);
    return ctx;
  }

  private async uninstall(ctx: SessionContext): Promise<StepResult> {
    const { output, prompts, lifecycle, store, artifacts } = this.services;
    output.heading('Uninstall');
    output.warn('This can remove the managed services, their data and the configuration.');
    if (!(await prompts.affirm('Are you sure you want to uninstall?'))) {
      output.warn(
        getErrorMessage(ErrorCode.E402_CONFIRMATION_REJECTED),
        getRemediationHint(ErrorCode.E402_CONFIRMATION_REJECTED)
      );
      return { ctx, next: 'MaintenanceMenu' };
    }

    const backup = store.backupRaw('uninstall');
    if (backup) {
      output.ok(`Configuration backed up to ${backup.path}`);
    }

    if (await prompts.confirm('Stop and remove all managed services?', true)) {
      await lifecycle.down();
      output.ok('Managed services removed');
    }

    if (await prompts.confirm(`Also remove data directory ${ctx.config.dataDir}?`)) {
      try {
        await this.services.removeDirectory(ctx.config.dataDir);
        output.ok('Data directory removed');
      } catch (error) {
        output.fail(error, `Remove it by hand: sudo rm -rf ${ctx.config.dataDir}`);
      }
    }

    let configurationRemoved = false;
    if (await prompts.confirm('Also remove configuration (.env, dashboard-config.js)? Backups are kept')) {
      store.remove(backup);
      artifacts.remove();
      configurationRemoved = true;
      output.ok('Configuration removed');
    }

    output.ok('Uninstall complete');
    const backups = store.listBackups();
    if (backups.length > 0) {
      output.line(`  ${backups.length} configuration backup(s) kept in ${store.backupDir}`);
    }
    return { ctx, next: configurationRemoved ? 'Exit' : 'MaintenanceMenu' };
  }

  // --- menu actions --------------------------------------------------------

  private async restartAll(ctx: SessionContext): Promise<SessionContext> {
    const { output, lifecycle, store, artifacts } = this.services;
    if (regenerateFromStore({ store, artifacts })) {
      output.ok('Dashboard config regenerated');
    }
    await lifecycle.restart('all');
    output.ok('Services restarted');
    return ctx;
  }

  private async stopAll(ctx: SessionContext): Promise<SessionContext> {
    await this.services.lifecycle.stop('all');
    this.services.output.ok('Services stopped');
    return ctx;
  }

  private async regenerate(ctx: SessionContext): Promise<SessionContext> {
    const { output, store, artifacts } = this.services;
    const result = regenerateFromStore({ store, artifacts });
    if (!result) {
      output.warn('No configuration to generate from', 'Run the setup first');
    } else {
      output.ok(`Dashboard config ${result.changed ? 'regenerated' : 'already up to date'}: ${result.path}`);
    }
    return ctx;
  }

  private async showConfiguration(ctx: SessionContext): Promise<SessionContext> {
    const { output, store, prompts } = this.services;
    const snapshot = store.load();
    if (!snapshot) {
      output.warn('No configuration found');
      return ctx;
    }
    output.heading('Current Configuration');
    serializeEnv(snapshot).trimEnd().split('\n').forEach((line) => output.line(line));
    output.line();
    output.line('Credentials:');
    for (const credential of readCredentials(snapshot, ctx.catalog)) {
      output.line(`  ${credential.key}: ${credential.validity} (${credential.provenance})`);
    }
    await prompts.pause();
    return ctx;
  }

  private async showStatus(ctx: SessionContext): Promise<SessionContext> {
    this.services.output.serviceStatus(await this.services.lifecycle.status());
    await this.services.prompts.pause();
    return ctx;
  }

  private async showErrors(ctx: SessionContext): Promise<SessionContext> {
    const { output, lifecycle, prompts } = this.services;
    const lines = await lifecycle.logs('all', { tail: 100, errorsOnly: true });
    if (lines.length === 0) {
      output.ok('No errors found in the last 100 lines');
    } else {
      lines.forEach((line) => output.line(line));
    }
    await prompts.pause();
    return ctx;
  }

  private async updateImages(ctx: SessionContext): Promise<SessionContext> {
    const { output, lifecycle } = this.services;
    output.line('Pulling latest images...');
    await lifecycle.pullLatest('all');
    await lifecycle.recreate('all');
    output.ok('Images updated and services restarted');
    return ctx;
  }

  private async updateSource(ctx: SessionContext): Promise<SessionContext> {
    const { output, prompts, updater, store, artifacts, lifecycle } = this.services;
    if (!updater.isRepository()) {
      throw new ConsoleError(ErrorCode.E303_SOURCE_UPDATE_FAILURE, `${ctx.config.installDir} is not a git clone`);
    }

    output.line('Checking for updates...');
    const check = await updater.check();
    if (check.upToDate) {
      output.ok('Already up to date');
      return ctx;
    }
    output.line('Updates available:');
    check.pendingCommits.forEach((commit) => output.line(`  ${commit}`));
    if (!(await prompts.confirm('Pull updates and restart?'))) {
      return ctx;
    }

    const current = store.load();
    if (current) {
      output.ok(`Configuration backed up to ${store.backup(current, 'source update').path}`);
    }
    const { changedFiles } = await updater.pull();
    if (changedFiles.some((file) => file.endsWith('.env.example'))) {
      output.warn('New configuration options available', 'Check .env.example for new fields');
    }
    if (regenerateFromStore({ store, artifacts })) {
      output.ok('Dashboard config regenerated');
    }
    await lifecycle.pullLatest('all');
    await lifecycle.recreate('all');
    output.ok('Update complete');
    return ctx;
  }
}
