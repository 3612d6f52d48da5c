/**
 * Console transition table
 *
 * state x choice -> { action, next }. States without a menu run a single flow
 * and name their successor in code; menu states are driven entirely by this
 * table.
 */

import { ConsoleError } from '../errors/console-error';
import { ErrorCode } from '../errors/error-codes';

export type ConsoleState =
  | 'Fresh'
  | 'MaintenanceMenu'
  | 'Reconfigure'
  | 'StatusAndLogs'
  | 'LogView'
  | 'LiveLogs'
  | 'RestartService'
  | 'Update'
  | 'Uninstall'
  | 'Exit';

export type ConsoleAction =
  | 'restartAll'
  | 'stopAll'
  | 'regenerate'
  | 'showConfiguration'
  | 'showStatus'
  | 'showErrors'
  | 'updateImages'
  | 'updateSource';

export interface Transition {
  choice: string;
  label: string;
  action?: ConsoleAction;
  next: ConsoleState;
}

export type MenuState = 'MaintenanceMenu' | 'StatusAndLogs' | 'Update';

export const MENU_TITLES: Readonly<Record<MenuState, string>> = {
  MaintenanceMenu: 'Feeder Management',
  StatusAndLogs: 'Status & Logs',
  Update: 'Update',
};

export const TRANSITIONS: Readonly<Record<MenuState, readonly Transition[]>> = {
  MaintenanceMenu: [
    { choice: 'restart', label: 'Restart all services', action: 'restartAll', next: 'MaintenanceMenu' },
    { choice: 'reconfigure', label: 'Reconfigure (current settings are backed up)', next: 'Reconfigure' },
    { choice: 'stop', label: 'Stop all services', action: 'stopAll', next: 'MaintenanceMenu' },
    { choice: 'status', label: 'Status & logs', next: 'StatusAndLogs' },
    { choice: 'update', label: 'Update', next: 'Update' },
    { choice: 'regenerate', label: 'Regenerate dashboard config', action: 'regenerate', next: 'MaintenanceMenu' },
    { choice: 'show', label: 'Show current configuration', action: 'showConfiguration', next: 'MaintenanceMenu' },
    { choice: 'uninstall', label: 'Uninstall', next: 'Uninstall' },
    { choice: 'exit', label: 'Exit', next: 'Exit' },
  ],
  StatusAndLogs: [
    { choice: 'status', label: 'Service status', action: 'showStatus', next: 'StatusAndLogs' },
    { choice: 'logs', label: 'Recent logs', next: 'LogView' },
    { choice: 'errors', label: 'Check for errors', action: 'showErrors', next: 'StatusAndLogs' },
    { choice: 'live', label: 'Live logs (Ctrl+C to stop)', next: 'LiveLogs' },
    { choice: 'restart-service', label: 'Restart a service', next: 'RestartService' },
    { choice: 'back', label: 'Back', next: 'MaintenanceMenu' },
  ],
  Update: [
    { choice: 'images', label: 'Update container images', action: 'updateImages', next: 'MaintenanceMenu' },
    { choice: 'source', label: 'Update console from git', action: 'updateSource', next: 'MaintenanceMenu' },
    { choice: 'back', label: 'Back', next: 'MaintenanceMenu' },
  ],
};

export function isMenuState(state: ConsoleState): state is MenuState {
  return Object.prototype.hasOwnProperty.call(TRANSITIONS, state);
}

/**
 * Look up a transition
 * @throws ConsoleError E401 when the state has no such choice
 */
export function transition(state: ConsoleState, choice: string): Transition {
  const found = isMenuState(state) ? TRANSITIONS[state].find((t) => t.choice === choice) : undefined;
  if (!found) {
    throw new ConsoleError(ErrorCode.E401_INVALID_TRANSITION, `${state} x ${choice}`);
  }
  return found;
}
