import { bracketDelta, clampAlpha, winWeight, winWeightFromDelta } from './win_weight';

describe('Win weight', () => {
    test('should halve a win taken two brackets above the table with alpha 0.5', () => {
        // Given: B_winner = 5, B_avg = (3 + 5 + 1) / 3 = 3
        const delta = bracketDelta(5, 3);

        // When
        const weight = winWeightFromDelta(2, 0.5);

        // Then: 1 / (1 + 0.5 * 2)
        expect(delta).toBe(2);
        expect(weight).toBe(0.5);
    });

    test('should reward a win taken below the table average', () => {
        expect(winWeightFromDelta(-2, 0.5)).toBe(2);
        expect(winWeightFromDelta(-0.5, 1)).toBe(1.5);
    });

    test('should keep a win at the table average neutral', () => {
        expect(winWeightFromDelta(0, 0.5)).toBe(1);
        expect(winWeightFromDelta(0, 3)).toBe(1);
    });

    test('should count every win as 1 when alpha is 0', () => {
        for (const delta of [-3, -1.25, 0, 0.75, 4]) {
            expect(winWeightFromDelta(delta, 0)).toBe(1);
        }
    });

    test('should treat a negative alpha as 0', () => {
        expect(clampAlpha(-2)).toBe(0);
        expect(clampAlpha(Number.NaN)).toBe(0);
        expect(winWeightFromDelta(2, -1)).toBe(1);
        expect(winWeightFromDelta(-2, -1)).toBe(1);
    });

    test('should fall back to weight 1 when a bracket is missing', () => {
        expect(bracketDelta(null, 3)).toBeNull();
        expect(bracketDelta(4, null)).toBeNull();
        expect(winWeight(null, 3, 0.5)).toBe(1);
        expect(winWeight(4, null, 0.5)).toBe(1);
        expect(winWeight(4, 3, 0.5)).toBeCloseTo(2 / 3, 10);
    });
});
