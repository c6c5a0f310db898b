export { convertCommand } from './convert-command.js';
export { fixCommand } from './fix-command.js';
export { mergeCommand } from './merge-command.js';
export { splitCommand } from './split-command.js';
export { infoCommand } from './info-command.js';
export { showCommand } from './show-command.js';
