import type {
  HeaderSource,
  HeaderSpec,
  Line,
  ResolutionFailure,
  Result,
} from "../types.js";

export interface HeaderContext {
  /** Lines strictly above the body start */
  headerLines: Line[];
  /** Code-resolved body lines */
  bodyLines: Line[];
  signal?: AbortSignal;
}

/**
 * One tier of header resolution. Tiers never throw: failures come back as
 * a ResolutionFailure so the resolver can move on to the next tier.
 */
export interface HeaderStrategy {
  readonly source: HeaderSource;
  resolve(context: HeaderContext): Promise<Result<HeaderSpec, ResolutionFailure>>;
}
