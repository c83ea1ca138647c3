import { TOOL_NAMES, ToolRegistry, type ToolHandler } from '../server/registry.js';
import type { CricketStore } from '../store/sqliteStore.js';
import { MatchProvider } from './matchProvider.js';
import { PlayerProvider } from './playerProvider.js';
import { TeamProvider } from './teamProvider.js';
import { VenueProvider } from './venueProvider.js';

function catalogOrder(a: ToolHandler, b: ToolHandler): number {
  return TOOL_NAMES.indexOf(a.descriptor.name) - TOOL_NAMES.indexOf(b.descriptor.name);
}

/**
 * Builds the registry with every cricket tool, listed in catalog order.
 */
export function createRegistry(store: CricketStore): ToolRegistry {
  const registry = new ToolRegistry();
  const handlers = [
    ...new TeamProvider(store).getTools(),
    ...new PlayerProvider(store).getTools(),
    ...new MatchProvider(store).getTools(),
    ...new VenueProvider(store).getTools(),
  ].sort(catalogOrder);

  for (const handler of handlers) {
    registry.register(handler);
  }
  return registry;
}
