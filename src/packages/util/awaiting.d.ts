// awaiting ships no type declarations; only what clusterboot uses.
declare module "awaiting" {
  export function delay(ms: number): Promise<void>;
}
