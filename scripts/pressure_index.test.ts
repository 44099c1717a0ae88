import { DEFAULT_PRESSURE_LABELS, PressureLabelTable, labelPressure, summarizePressure } from './pressure_index';

describe('Pressure labels', () => {
    test('should follow the default step function', () => {
        expect(labelPressure(2.5)).toBe('wins far above table');
        expect(labelPressure(2)).toBe('wins far above table');
        expect(labelPressure(1)).toBe('wins skew above table');
        expect(labelPressure(0.99)).toBe('in line with table');
        expect(labelPressure(0)).toBe('in line with table');
        expect(labelPressure(-0.5)).toBe('in line with table');
        expect(labelPressure(-1)).toBe('wins skew below table');
        expect(labelPressure(-3)).toBe('wins skew below table');
        expect(labelPressure(null)).toBe('n/a');
    });

    test('should use a custom table when one is given', () => {
        const table: PressureLabelTable = {
            bands: [
                { label: 'stomp', min: 0.5 },
                { label: 'underdog', max: -0.5 },
            ],
            neutral: 'fair',
            insufficient: 'too few wins',
        };

        expect(labelPressure(0.5, table)).toBe('stomp');
        expect(labelPressure(0.2, table)).toBe('fair');
        expect(labelPressure(-0.6, table)).toBe('underdog');
        expect(labelPressure(null, table)).toBe('too few wins');
    });
});

describe('Pressure summary', () => {
    test('should stay null with fewer than two qualifying wins', () => {
        // When
        const summary = summarizePressure([{ delta: 2, tableAvg: 3 }], 1);

        // Then
        expect(summary).toEqual({
            pressureIndex: null,
            pressureLabel: 'n/a',
            winCoverage: 1,
            avgTableBracket: 3,
        });
    });

    test('should average deltas and table brackets over qualifying wins', () => {
        // Given: three wins, two of them with a computable delta
        const qualifying = [
            { delta: 1.5, tableAvg: 2.5 },
            { delta: 0.5, tableAvg: 3.5 },
        ];

        // When
        const summary = summarizePressure(qualifying, 3, DEFAULT_PRESSURE_LABELS);

        // Then
        expect(summary.pressureIndex).toBe(1);
        expect(summary.pressureLabel).toBe('wins skew above table');
        expect(summary.winCoverage).toBeCloseTo(2 / 3, 10);
        expect(summary.avgTableBracket).toBe(3);
    });

    test('should label an index that lands on a band bound despite float error', () => {
        // Given: 0.3 + -0.1 sums to 0.19999999999999998
        const table: PressureLabelTable = { bands: [{ label: 'above', min: 0.1 }], neutral: 'level', insufficient: 'n/a' };

        // When
        const summary = summarizePressure(
            [
                { delta: 0.3, tableAvg: 2 },
                { delta: -0.1, tableAvg: 2 },
            ],
            2,
            table,
        );

        // Then
        expect(summary.pressureIndex).toBe(0.1);
        expect(summary.pressureLabel).toBe('above');
    });

    test('should leave coverage null when there are no wins', () => {
        expect(summarizePressure([], 0)).toEqual({
            pressureIndex: null,
            pressureLabel: 'n/a',
            winCoverage: null,
            avgTableBracket: null,
        });
    });
});
