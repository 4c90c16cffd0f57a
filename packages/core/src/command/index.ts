export { Command, type CommandOptions } from './command.js';
