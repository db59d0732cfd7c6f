// Learning record kept per research cycle

export const MAX_INSIGHTS = 10;

export interface AgentMemorySnapshot {
  stock_symbol: string;
  timestamp: string;
  insights: string[];
  quality_scores: Record<string, number>;
  recommendations: string[];
  analysis_count: number;
}

export class AgentMemory {
  readonly stock_symbol: string;
  readonly timestamp: string;
  private insightList: string[] = [];
  quality_scores: Record<string, number> = {};
  recommendations: string[] = [];
  /** Number of scores folded into `quality_scores.overall` */
  analysis_count = 0;

  constructor(symbol: string, timestamp: string = new Date().toISOString()) {
    this.stock_symbol = symbol;
    this.timestamp = timestamp;
  }

  /** Snapshot; add through `addInsight` */
  get insights(): readonly string[] {
    return [...this.insightList];
  }

  /** Duplicates are ignored; only the 10 most recent insights are kept */
  addInsight(insight: string): void {
    if (this.insightList.includes(insight)) return;
    this.insightList.push(insight);
    if (this.insightList.length > MAX_INSIGHTS) {
      this.insightList = this.insightList.slice(-MAX_INSIGHTS);
    }
  }

  /** Fold a score into the running average held in `quality_scores.overall` */
  updateQuality(score: number): void {
    const current = this.quality_scores.overall ?? score;
    this.analysis_count += 1;
    const n = this.analysis_count;
    this.quality_scores.overall = (current * (n - 1) + score) / n;
  }

  toJSON(): AgentMemorySnapshot {
    return {
      stock_symbol: this.stock_symbol,
      timestamp: this.timestamp,
      insights: [...this.insightList],
      quality_scores: { ...this.quality_scores },
      recommendations: [...this.recommendations],
      analysis_count: this.analysis_count,
    };
  }
}
