/**
 * Mimetype handling
 *
 * Provides mimetype validation and the input/output transform dispatch
 * tables used when parts are pushed and pulled.
 *
 * @packageDocumentation
 */

export { assertMimetype, mimetypeEssence, primaryType } from './mimetype.js';

export {
  JSON_MIMETYPES,
  SCRIPT_MIMETYPES,
  BINARY_PRIMARY_TYPES,
  INPUT_TRANSFORMS,
  OUTPUT_TRANSFORMS,
  resolveTransform,
  resolveInputTransform,
  resolveOutputTransform,
} from './dispatch.js';

export type {
  InputTransform,
  OutputTransform,
  DispatchMatch,
  DispatchTable,
  Resolved,
} from './dispatch.js';
