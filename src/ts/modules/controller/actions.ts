import type { Action, PanelHost } from '../../types';

/** Run a panel action: commands go to the host verbatim, callbacks are awaited */
export async function invokeAction(host: PanelHost, action: Action): Promise<void> {
  switch (action.kind) {
    case 'command':
      host.execute(action.command);
      return;
    case 'callback':
      await action.run();
      return;
  }
}
