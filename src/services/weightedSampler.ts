import { RandomSource } from './randomSource';

/**
 * Categorical sampler over a fixed set of outcomes. Weights are relative and
 * need not sum to 1.
 */
export class WeightedSampler<T> {
    private readonly outcomes: readonly T[];
    private readonly cumulative: number[];
    private readonly total: number;

    constructor(outcomes: readonly T[], weights: readonly number[]) {
        if (outcomes.length == 0) {
            throw new RangeError('WeightedSampler needs at least one outcome');
        }

        if (outcomes.length != weights.length) {
            throw new RangeError(`Expected ${outcomes.length} weights, got ${weights.length}`);
        }

        let running = 0;
        this.cumulative = weights.map(weight => {
            if (!Number.isFinite(weight) || weight < 0) {
                throw new RangeError(`Invalid weight: ${weight}`);
            }
            running += weight;
            return running;
        });

        if (running <= 0) {
            throw new RangeError('Weights must not all be zero');
        }

        this.outcomes = outcomes;
        this.total = running;
    }

    static fromTable<K extends string>(table: Readonly<Record<K, number>>): WeightedSampler<K> {
        const outcomes: K[] = [];
        const weights: number[] = [];

        for (const key in table) {
            outcomes.push(key);
            weights.push(table[key]);
        }

        return new WeightedSampler(outcomes, weights);
    }

    sample(random: RandomSource): T {
        const target = random.next() * this.total;

        for (let i = 0; i < this.cumulative.length; i++) {
            if (target < this.cumulative[i]) {
                return this.outcomes[i];
            }
        }

        // floating-point drift at the top edge
        return this.outcomes[this.outcomes.length - 1];
    }

    probabilityOf(outcome: T): number {
        const index = this.outcomes.indexOf(outcome);
        if (index < 0) {
            return 0;
        }

        const previous = index == 0 ? 0 : this.cumulative[index - 1];
        return (this.cumulative[index] - previous) / this.total;
    }
}
