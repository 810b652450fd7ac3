import type { Command } from '../types.js';
import { encodeCommand } from './encode.js';
import { decodeCommand } from './decode.js';
import { configCommand } from './config.js';

export const commands: Command[] = [encodeCommand, decodeCommand, configCommand];
