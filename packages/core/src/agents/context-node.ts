import type { PriorContextResolver } from '../session/prior-context.js';
import type { AnalysisGraphState, AnalysisNode } from '../orchestration/analysis-state.js';

export function createContextNode(resolver: PriorContextResolver | undefined): AnalysisNode {
  return async (state: AnalysisGraphState): Promise<Partial<AnalysisGraphState>> => {
    if (!resolver || !state.contextHandle) {
      return { priorContext: [] };
    }
    return { priorContext: await resolver.resolve(state.contextHandle) };
  };
}
