export type TimeoutConfig = {
  readonly requestMs?: number;
};
