/**
 * Uniform provider response wrapper
 * `error` is 0 on success; otherwise `msg` describes the failure
 */
export interface ProviderEnvelope<T = unknown> {
  error: number;
  msg?: string;
  data?: T;
}
