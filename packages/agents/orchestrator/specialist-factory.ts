// Factory for creating specialist agent instances by kind

import type { SpecialistKind } from '../config/agent-catalog.js';
import type { SpecialistAgent } from '../agents/base-analyst.js';
import type { StructuredModelCaller } from '../llm/structured-caller.js';
import { MarketAnalyst } from '../agents/market-analyst.js';
import { FundamentalsAnalyst } from '../agents/fundamentals-analyst.js';
import { EconomicAnalyst } from '../agents/economic-analyst.js';
import { RegulatoryAnalyst } from '../agents/regulatory-analyst.js';

export type SpecialistTeam = Record<SpecialistKind, SpecialistAgent>;

const FACTORY: Record<SpecialistKind, (caller: StructuredModelCaller) => SpecialistAgent> = {
  market: caller => new MarketAnalyst(caller),
  fundamentals: caller => new FundamentalsAnalyst(caller),
  economic: caller => new EconomicAnalyst(caller),
  regulatory: () => new RegulatoryAnalyst(),
};

export function createSpecialist(kind: SpecialistKind, caller: StructuredModelCaller): SpecialistAgent {
  return FACTORY[kind](caller);
}

export function createSpecialistTeam(caller: StructuredModelCaller): SpecialistTeam {
  return {
    market: createSpecialist('market', caller),
    fundamentals: createSpecialist('fundamentals', caller),
    economic: createSpecialist('economic', caller),
    regulatory: createSpecialist('regulatory', caller),
  };
}
