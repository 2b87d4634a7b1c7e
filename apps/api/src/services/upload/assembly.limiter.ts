// src/services/upload/assembly.limiter.ts

import PQueue from "p-queue";

// Assemblies copy whole files; cap how many hit the disk at once.
export function createAssemblyQueue(concurrency: number): PQueue {
  return new PQueue({ concurrency });
}
