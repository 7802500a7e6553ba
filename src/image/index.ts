export { encodePng, decodePng, ImageFormatError } from './png.js';
