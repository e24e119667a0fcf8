export { encodeJson, decodeJson } from './json-codec';
