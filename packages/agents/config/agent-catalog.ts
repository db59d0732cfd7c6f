// Specialist agent catalogue — names, routing descriptions and fixed confidence

export type SpecialistKind = 'market' | 'fundamentals' | 'economic' | 'regulatory';

export interface AgentCapability {
  readonly kind: SpecialistKind;
  readonly name: string;
  readonly description: string;
  readonly confidence: number;
  readonly dataProvider: string;
}

export const AGENT_CATALOG: Record<SpecialistKind, AgentCapability> = {
  market: {
    kind: 'market',
    name: 'MarketDataAgent',
    description: 'Analyzes price trends, volatility, market conditions',
    confidence: 0.85,
    dataProvider: 'Yahoo Finance',
  },
  fundamentals: {
    kind: 'fundamentals',
    name: 'FundamentalsAgent',
    description: 'Analyzes profitability, growth, financial health',
    confidence: 0.82,
    dataProvider: 'Yahoo Finance + Alpha Vantage',
  },
  economic: {
    kind: 'economic',
    name: 'EconomicContextAgent',
    description: 'Analyzes macroeconomic factors, sector outlook',
    confidence: 0.85,
    dataProvider: 'FRED',
  },
  regulatory: {
    kind: 'regulatory',
    name: 'RegulatoryAgent',
    description: 'Analyzes SEC filings, compliance status',
    confidence: 0.70,
    dataProvider: 'SEC EDGAR',
  },
};

/** Agent names in the fixed analysis order */
export const AGENT_NAMES: readonly string[] = [
  AGENT_CATALOG.market.name,
  AGENT_CATALOG.fundamentals.name,
  AGENT_CATALOG.economic.name,
  AGENT_CATALOG.regulatory.name,
];

export function describeAgent(name: string): string {
  for (const capability of Object.values(AGENT_CATALOG)) {
    if (capability.name === name) return capability.description;
  }
  return 'Financial analysis';
}
