/**
 * Panel Commands
 *
 * User commands over the controller, with name and edge completion.
 */

import type { CommandDefinition, PanelHost } from '../../types';
import { COMMAND_PREFIX, EDGES } from '../../constants';
import { ConfigError } from '../../errors';
import { createLogger } from '../logging';
import { isEdge, type PanelRegistry } from '../registry';
import type { ExclusivityController } from '../controller';

const log = createLogger('commands');

function completeFrom(candidates: readonly string[], argLead: string): string[] {
  return candidates.filter((candidate) => candidate.startsWith(argLead));
}

export function createPanelCommands(
  registry: PanelRegistry,
  controller: ExclusivityController,
): CommandDefinition[] {
  const completeName = (argLead: string): string[] => completeFrom(registry.names(), argLead);

  function nameCommand(suffix: string, run: (name: string) => Promise<void>): CommandDefinition {
    return { name: COMMAND_PREFIX + suffix, nargs: 1, run, complete: completeName };
  }

  return [
    nameCommand('', (name) => controller.open(name)),
    nameCommand('Open', (name) => controller.open(name)),
    nameCommand('Switch', (name) => controller.switch(name)),
    nameCommand('Toggle', (name) => controller.toggle(name)),
    nameCommand('Close', (name) => controller.close(name)),
    {
      name: `${COMMAND_PREFIX}CloseSide`,
      nargs: 1,
      async run(edge: string): Promise<void> {
        if (!isEdge(edge)) {
          throw new ConfigError(`Unrecognized edge "${edge}" (expected ${EDGES.join(', ')})`);
        }
        await controller.closeSide(edge);
      },
      complete: (argLead) => completeFrom(EDGES, argLead),
    },
    {
      name: `${COMMAND_PREFIX}CloseAll`,
      nargs: 0,
      run: () => controller.closeAll(),
      complete: () => [],
    },
  ];
}

/** Register commands on hosts that support user commands; returns how many were */
export function registerCommands(host: PanelHost, commands: CommandDefinition[]): number {
  if (!host.createCommand) {
    log.verbose(() => 'Host has no user commands, skipping registration');
    return 0;
  }
  for (const command of commands) {
    host.createCommand(command);
  }
  log.verbose(() => `Registered ${commands.length} commands`);
  return commands.length;
}
