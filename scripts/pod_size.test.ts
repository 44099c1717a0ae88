import { normalizeGames } from './game_snapshot';
import { segmentByPodSize } from './pod_size';

describe('Pod size segmentation', () => {
    test('should aggregate each observed pod size on its own games', () => {
        // Given
        const { games } = normalizeGames([
            {
                id: 'g1',
                playedAt: '2025-03-01T19:00:00.000Z',
                winner: 'A',
                entries: [
                    { player: 'A', commander: 'X', bracket: 3 },
                    { player: 'B', commander: 'Y', bracket: 3 },
                ],
            },
            {
                id: 'g2',
                playedAt: '2025-03-02T19:00:00.000Z',
                winner: 'B',
                entries: [
                    { player: 'A', commander: 'X', bracket: 3 },
                    { player: 'B', commander: 'Y', bracket: 3 },
                    { player: 'C', commander: 'Z', bracket: 3 },
                ],
            },
            { id: 'g3', playedAt: '2025-03-03T19:00:00.000Z', winner: null, entries: [] },
        ]);

        // When
        const pods = segmentByPodSize(games, { alpha: 0.5 });

        // Then
        expect(pods.sizes).toEqual([2, 3]);
        expect(Object.keys(pods.bySize)).toEqual(['2', '3']);
        expect(pods.bySize['2'].games).toBe(1);
        expect(pods.bySize['2'].entries).toBe(2);
        expect(pods.bySize['2'].byPlayer.map((row) => [row.player, row.games, row.wins])).toEqual([
            ['A', 1, 1],
            ['B', 1, 0],
        ]);
        expect(pods.bySize['3'].byPlayer.map((row) => [row.player, row.games, row.wins])).toEqual([
            ['A', 1, 0],
            ['B', 1, 1],
            ['C', 1, 0],
        ]);
        expect(pods.bySize['3'].byPlayerCommander).toHaveLength(3);
    });

    test('should return no segments for an empty snapshot', () => {
        expect(segmentByPodSize([], { alpha: 0.5 })).toEqual({ sizes: [], bySize: {} });
    });
});
