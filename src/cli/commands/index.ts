export { encodeCommand } from './encode.js';
export { decodeCommand } from './decode.js';
export { infoCommand } from './info.js';
