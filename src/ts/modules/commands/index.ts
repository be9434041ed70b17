export { createPanelCommands, registerCommands } from './commands';
