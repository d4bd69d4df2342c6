export { ServerFlags } from './flags.js';
export { formatRequestLine, formatServerUrl } from './output.js';
