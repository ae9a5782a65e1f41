// src/utils/lifecycle.ts

/**
 * Acquires a resource, hands it to `use`, and releases it on every exit path.
 */
export async function withResource<R, T>(
  acquire: () => Promise<R>,
  release: (resource: R) => Promise<void>,
  use: (resource: R) => Promise<T>,
): Promise<T> {
  const resource = await acquire();
  try {
    return await use(resource);
  } finally {
    await release(resource);
  }
}

/** Resolves with the first termination signal the process receives. */
export function waitForShutdown(signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const handler = (signal: NodeJS.Signals) => {
      signals.forEach((name) => process.off(name, handler));
      resolve(signal);
    };
    signals.forEach((name) => process.once(name, handler));
  });
}
