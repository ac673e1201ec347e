export {
  FlakeReferenceResolver,
  isFlakeReference,
  PlainPathResolver,
  resolveTarget,
  selectResolver,
  splitFlakeReference,
} from "./resolver.js";
export type { TargetResolver } from "./resolver.js";
