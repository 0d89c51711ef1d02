import type { CollectorAdapter } from './interface.js';
import { LinuxCollectorAdapter } from './linux.js';
import { WindowsCollectorAdapter } from './windows.js';

const adapters = new Map<string, CollectorAdapter>();

function register(adapter: CollectorAdapter): void {
  adapters.set(adapter.itemName, adapter);
}

register(new LinuxCollectorAdapter());
register(new WindowsCollectorAdapter());

/** Adapter for a monitoring item name, or undefined when unknown. */
export function getCollectorAdapter(itemName: string): CollectorAdapter | undefined {
  return adapters.get(itemName);
}

export function getCollectorItemNames(): string[] {
  return [...adapters.keys()];
}
