/**
 * Disambiguation of fragmented coordinate rows.
 */

export {
  FRAGMENT_GROUP_PREFIX,
  FragmentResolver,
  coordinateKey,
  resolveFragments,
  type FragmentResolution,
} from "./resolver.js";
