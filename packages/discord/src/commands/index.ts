import { askCommand } from './ask.js';
import { llmListCommand } from './llm-list.js';
import { llmSetCommand } from './llm-set.js';
import { resetCommand } from './reset.js';
import { infoCommand } from './info.js';
import { clearCommand } from './clear.js';
import { helpCommand } from './help.js';
import { reloadCommand } from './reload.js';
import type { RelayCommand } from './types.js';

export const relayCommands: RelayCommand[] = [
  askCommand,
  llmListCommand,
  llmSetCommand,
  resetCommand,
  infoCommand,
  clearCommand,
  helpCommand,
  reloadCommand,
];

export type { RelayCommand, RelayInteraction, CommandContext } from './types.js';
