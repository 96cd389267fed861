import type { Classification, EventKind } from './schemas.js';
import type { SelectorDialect } from '../config/selectors.js';

export type ClassifierMatch = { kind: EventKind; selector: string } | { kind: 'none' };

export class SignatureClassifier {
  private readonly contract: string;
  private readonly stake: string[];
  private readonly unstake: string[];

  constructor(stakingContract: string, dialect: Pick<SelectorDialect, 'stake' | 'unstake'>) {
    this.contract = stakingContract.toLowerCase();
    this.stake = dialect.stake.map(s => s.toLowerCase());
    this.unstake = dialect.unstake.map(s => s.toLowerCase());
  }

  match(destination: string | null | undefined, input: string | null | undefined): ClassifierMatch {
    if (!destination || destination.toLowerCase() !== this.contract) return { kind: 'none' };
    const data = (input || '').toLowerCase();
    // stake list wins when a selector shows up in both
    for (const s of this.stake) if (data.startsWith(s)) return { kind: 'stake', selector: s };
    for (const s of this.unstake) if (data.startsWith(s)) return { kind: 'unstake', selector: s };
    return { kind: 'none' };
  }

  classify(destination: string | null | undefined, input: string | null | undefined): Classification {
    return this.match(destination, input).kind;
  }
}
