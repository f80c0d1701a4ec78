import { Faker, Randomizer, base, en, generateMersenne53Randomizer } from '@faker-js/faker';

/**
 * The single random stream a pipeline run draws from.
 *
 * Numeric draws and the fake names/emails produced through `faker` share one
 * randomizer, so a seeded run is reproducible end to end.
 */
export class RandomSource {
    readonly faker: Faker;
    readonly seed: number | null;
    private readonly randomizer: Randomizer;

    constructor(seed: number | null = null, randomizer: Randomizer = generateMersenne53Randomizer()) {
        this.randomizer = randomizer;
        this.seed = seed;

        if (seed !== null) {
            this.randomizer.seed(seed);
        }

        this.faker = new Faker({ locale: [en, base], randomizer: this.randomizer });
    }

    /** Uniform in [0, 1). */
    next(): number {
        return this.randomizer.next();
    }

    /** Uniform integer in [min, max], both inclusive. */
    int(min: number, max: number): number {
        return min + Math.floor(this.next() * (max - min + 1));
    }

    uniform(min: number, max: number): number {
        return min + this.next() * (max - min);
    }

    chance(probability: number): boolean {
        return this.next() < probability;
    }

    pick<T>(items: readonly T[]): T {
        if (items.length == 0) {
            throw new RangeError('Cannot pick from an empty list');
        }

        return items[this.int(0, items.length - 1)];
    }
}

export const roundTo2 = (value: number): number => Math.round(value * 100) / 100;
