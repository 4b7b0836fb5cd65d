import type { Middleware, ProviderAdapter } from '../types/index.js';

export type ClientConfig = {
  readonly provider: ProviderAdapter;
  readonly middleware?: ReadonlyArray<Middleware>;
};
