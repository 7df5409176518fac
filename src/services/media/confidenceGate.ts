import { ConfidenceConfig } from '../../config/types.js';
import { ConfidenceVerdict } from '../../types/media.js';
import { titleSimilarity } from './titleSimilarity.js';

/**
 * Three bands over the title similarity score:
 * below `low` rejects, below `high` warns, anything else accepts.
 */
export class ConfidenceGate {
  constructor(private readonly thresholds: Pick<ConfidenceConfig, 'low' | 'high'>) {}

  score(parsedTitle: string, resultTitle: string): number {
    return titleSimilarity(parsedTitle, resultTitle);
  }

  decide(score: number): ConfidenceVerdict {
    if (score < this.thresholds.low) {
      return { score, decision: 'reject' };
    }
    if (score < this.thresholds.high) {
      return { score, decision: 'warn' };
    }
    return { score, decision: 'accept' };
  }

  evaluate(parsedTitle: string, resultTitle: string): ConfidenceVerdict {
    return this.decide(this.score(parsedTitle, resultTitle));
  }
}
