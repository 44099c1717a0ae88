import * as path from 'path';
import { Timestamp } from 'firebase-admin/firestore';
import { SnapshotReadError } from './errors';
import { GamesCollectionReader, loadGamesFromFile, loadGamesFromFirestore, parseGamesSnapshot } from './games_loader';

describe('Games snapshot parsing', () => {
    test('should normalise ids, timestamps and names', () => {
        // When
        const { games, warnings } = parseGamesSnapshot([
            {
                id: 7,
                playedAt: '2025-01-10T20:00:00+01:00',
                winner: '  ',
                entries: [{ player: ' Alice ', commander: 'Storm Herald', bracket: '4' }],
            },
        ]);

        // Then
        expect(warnings).toEqual([]);
        expect(games).toEqual([
            {
                id: '7',
                playedAt: '2025-01-10T19:00:00.000Z',
                winner: null,
                entries: [{ player: 'Alice', commander: 'Storm Herald', bracket: '4' }],
            },
        ]);
    });

    test('should skip malformed and duplicate games with a warning', () => {
        // When
        const { games, warnings } = parseGamesSnapshot({
            games: [
                { id: 'a', playedAt: '2025-01-10T20:00:00Z', winner: 'Bob', entries: [] },
                { id: 'bad', winner: 'Bob', entries: [] },
                { id: 'a', playedAt: '2025-01-11T20:00:00Z', winner: 'Bob', entries: [] },
                'not a game',
            ],
        });

        // Then
        expect(games.map((game) => game.id)).toEqual(['a']);
        expect(warnings.map((w) => [w.code, w.gameId])).toEqual([
            ['game-invalid', 'bad'],
            ['game-invalid', 'a'],
            ['game-invalid', '#3'],
        ]);
        expect(warnings[0].message).toBe('Skipped: playedAt: Required');
        expect(warnings[1].message).toBe('Skipped: duplicate game id');
    });

    test('should read timestamps without an offset as UTC', () => {
        const { games, warnings } = parseGamesSnapshot([
            {
                id: 1,
                playedAt: '2025-01-10T20:00:00',
                winner: 'Alice',
                entries: [{ player: 'Alice', commander: 'Storm Herald', bracket: 4 }],
            },
            { id: 2, playedAt: '2025-01-11T20:00:00.250', winner: null, entries: [] },
        ]);

        expect(warnings).toEqual([]);
        expect(games.map((game) => game.playedAt)).toEqual(['2025-01-10T20:00:00.000Z', '2025-01-11T20:00:00.250Z']);
    });

    test('should drop a malformed entry and keep the rest of its game', () => {
        // When
        const { games, warnings } = parseGamesSnapshot([
            {
                id: 'g1',
                playedAt: '2025-01-10T20:00:00Z',
                winner: 'Alice',
                entries: [
                    { player: 'Alice', commander: 'Storm Herald', bracket: 4 },
                    { player: 'Bob', commander: 'Goblin Marshal', bracket: 3 },
                    { player: '', commander: 'Tide Keeper', bracket: 2 },
                ],
            },
        ]);

        // Then
        expect(games).toHaveLength(1);
        expect(games[0].entries.map((entry) => entry.player)).toEqual(['Alice', 'Bob']);
        expect(warnings).toEqual([
            { code: 'entry-invalid', gameId: 'g1', message: 'Dropped entry 2: player: Player name is required' },
        ]);
    });

    test('should refuse a snapshot that is not a list of games', () => {
        expect(() => parseGamesSnapshot({ rows: [] })).toThrow(SnapshotReadError);
        expect(() => parseGamesSnapshot('games')).toThrow(SnapshotReadError);
    });
});

describe('Games loading', () => {
    test('should read the bundled sample snapshot', () => {
        const { games, warnings } = loadGamesFromFile(path.join(__dirname, '..', 'data', 'sample_games.json'));

        expect(warnings).toEqual([]);
        expect(games.map((game) => game.id)).toEqual(['1', '2', '3', '4', '5', '6']);
        expect(games[0].notes).toBe('opening night');
    });

    test('should raise SnapshotReadError for a missing file', () => {
        expect(() => loadGamesFromFile(path.join(__dirname, 'no-such-file.json'))).toThrow(SnapshotReadError);
    });

    test('should read Firestore documents in play order', async () => {
        // Given
        const docs = [
            {
                id: 'late',
                data: () => ({
                    playedAt: Timestamp.fromDate(new Date('2025-02-02T20:00:00Z')),
                    winner: 'Bob',
                    entries: [{ player: 'Bob', commander: 'Goblin Marshal', bracket: 3 }],
                }),
            },
            {
                id: 'early',
                data: () => ({
                    playedAt: Timestamp.fromDate(new Date('2025-02-01T20:00:00Z')),
                    winner: 'Alice',
                    entries: [{ player: 'Alice', commander: 'Storm Herald', bracket: 4 }],
                }),
            },
        ];
        const db: GamesCollectionReader = {
            collection: jest.fn(() => ({ get: async () => ({ docs }) })),
        };

        // When
        const { games } = await loadGamesFromFirestore(db, 'pods');

        // Then
        expect(db.collection).toHaveBeenCalledWith('pods');
        expect(games.map((game) => [game.id, game.playedAt])).toEqual([
            ['early', '2025-02-01T20:00:00.000Z'],
            ['late', '2025-02-02T20:00:00.000Z'],
        ]);
    });

    test('should wrap Firestore read failures', async () => {
        const db: GamesCollectionReader = {
            collection: () => ({
                get: async () => {
                    throw new Error('unavailable');
                },
            }),
        };

        const load = loadGamesFromFirestore(db);

        await expect(load).rejects.toBeInstanceOf(SnapshotReadError);
        await expect(load).rejects.toThrow('Cannot read Firestore collection "games": unavailable');
    });
});
