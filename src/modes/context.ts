import { Catalogue } from '../types';
import { Prompter } from '../utils/prompt';

export interface ModeContext {
  deviceId: string;
  catalogue: Catalogue;
  prompter: Prompter;
  // Fired when the operator presses Ctrl+C
  signal: AbortSignal;
}
