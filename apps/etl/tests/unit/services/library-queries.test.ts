import { openDatabase, type LibraryDatabase } from '../../../src/lib/database';
import { ensureSchema } from '../../../src/lib/schema';
import { runLibrarySync } from '../../../src/services/library-sync';
import {
    getAlbumReleaseSequence,
    getAlbumReleaseYears,
    getArtistPopularityRanking,
    getArtistPopularityTiers,
    getAverageDurationByPlaylist,
    getExplicitContentByPlaylist,
    getMissingGenreCount,
    getMostFeaturedArtists,
    getPlaylistArtistDiversity,
    getPlaylistSizeCategories,
    getTopTracksByPopularity,
    getTrackPlaylistCounts,
    getTracksPerPlaylist,
    getUnnamedTracks,
    isLibraryQueryName,
    LIBRARY_QUERIES,
    MutatingQueryError,
    runReadOnly,
} from '../../../src/services/library-queries';
import { FakeCatalogSource } from '../../mocks/catalog.mock';
import { createLibraryData } from '../../fixtures/library';

describe('services/library-queries', () => {
    describe('on the synced fixture library', () => {
        let db: LibraryDatabase;

        beforeAll(async () => {
            db = openDatabase(':memory:');
            await runLibrarySync(db, new FakeCatalogSource(createLibraryData()));
        });

        afterAll(() => {
            db.close();
        });

        it('lists playlists by declared track count', () => {
            expect(getTracksPerPlaylist(db)).toEqual([
                { playlist_name: 'Road Trip', num_tracks: 25 },
                { playlist_name: 'Night Mix', num_tracks: 15 },
                { playlist_name: 'Empty Ideas', num_tracks: 0 },
            ]);
        });

        it('lists the most popular tracks with their artist', () => {
            expect(getTopTracksByPopularity(db)).toEqual([
                { track_name: 'Midnight Drive', artist_name: 'Nova Lights', popularity: 90 },
                { track_name: 'Static Hearts', artist_name: 'Nova Lights', popularity: 80 },
                { track_name: null, artist_name: 'Nova Lights', popularity: 70 },
                { track_name: 'Harbor Lights', artist_name: 'Quiet Harbor', popularity: 50 },
            ]);
        });

        it('labels artists by average popularity, least popular first', () => {
            expect(getArtistPopularityTiers(db)).toEqual([
                { artist_name: 'Quiet Harbor', avg_popularity: 50, popularity_level: '🌱 Underrated Gem' },
                { artist_name: 'Nova Lights', avg_popularity: 80, popularity_level: '🔥 Superstar' },
            ]);
        });

        it('reports artist diversity per playlist with null for empty playlists', () => {
            expect(getPlaylistArtistDiversity(db)).toEqual([
                { playlist_name: 'Road Trip', unique_artists: 2, total_tracks: 2, diversity_percent: 100 },
                { playlist_name: 'Night Mix', unique_artists: 1, total_tracks: 3, diversity_percent: 33.3 },
                { playlist_name: 'Empty Ideas', unique_artists: 0, total_tracks: 0, diversity_percent: null },
            ]);
        });

        it('averages track duration in minutes', () => {
            expect(getAverageDurationByPlaylist(db)).toEqual([
                { playlist_name: 'Night Mix', avg_duration_min: 3.4 },
                { playlist_name: 'Road Trip', avg_duration_min: 3.4 },
            ]);
        });

        it('reports the explicit share per playlist', () => {
            expect(getExplicitContentByPlaylist(db)).toEqual([
                { playlist_name: 'Road Trip', explicit_count: 1, total_tracks: 2, explicit_percent: 50 },
                { playlist_name: 'Night Mix', explicit_count: 1, total_tracks: 3, explicit_percent: 33.3 },
            ]);
        });

        it('counts the playlists each artist appears in', () => {
            expect(getMostFeaturedArtists(db)).toEqual([
                { artist_name: 'Nova Lights', playlist_count: 2 },
                { artist_name: 'Quiet Harbor', playlist_count: 1 },
            ]);
        });

        it('ranks artists by average popularity', () => {
            expect(getArtistPopularityRanking(db)).toEqual([
                { artist_name: 'Nova Lights', avg_popularity: 80, rank_position: 1 },
                { artist_name: 'Quiet Harbor', avg_popularity: 50, rank_position: 2 },
            ]);
        });

        it('pairs albums with the previous release of the same artist', () => {
            expect(getAlbumReleaseSequence(db)).toEqual([
                {
                    artist_name: 'Nova Lights',
                    album_name: 'Afterglow',
                    release_date: '2021',
                    previous_release: '2019-05-10',
                },
            ]);
        });

        it('splits playlists into short and large at twenty tracks', () => {
            expect(getPlaylistSizeCategories(db)).toEqual([
                { playlist_name: 'Empty Ideas', num_tracks: 0, category: 'Short Playlist' },
                { playlist_name: 'Night Mix', num_tracks: 15, category: 'Short Playlist' },
                { playlist_name: 'Road Trip', num_tracks: 25, category: 'Large Playlist' },
            ]);
        });

        it('extracts the release year from any date precision', () => {
            expect(getAlbumReleaseYears(db)).toEqual([
                { album_name: 'Afterglow', release_year: '2021' },
                { album_name: 'Low Tide', release_year: '2020' },
                { album_name: 'Neon Rivers', release_year: '2019' },
            ]);
        });

        it('shows unnamed tracks as "Unknown Track" when counting playlists', () => {
            expect(getTrackPlaylistCounts(db)).toEqual([
                { track_name: 'Midnight Drive', artist_name: 'Nova Lights', playlist_count: 2 },
                { track_name: 'Harbor Lights', artist_name: 'Quiet Harbor', playlist_count: 1 },
                { track_name: 'Static Hearts', artist_name: 'Nova Lights', playlist_count: 1 },
                { track_name: 'Unknown Track', artist_name: 'Nova Lights', playlist_count: 1 },
            ]);
        });

        it('lists tracks stored without a name', () => {
            expect(getUnnamedTracks(db)).toEqual([
                {
                    track_id: 'track-untitled',
                    album_id: 'album-afterglow',
                    popularity: 70,
                    duration_ms: 240000,
                    explicit: 0,
                },
            ]);
        });

        it('counts artists still missing genres', () => {
            expect(getMissingGenreCount(db)).toEqual([{ missing_genres: 1 }]);
        });

        it('runs every registered query without error', () => {
            for (const query of Object.values(LIBRARY_QUERIES)) {
                expect(Array.isArray(query.run(db))).toBe(true);
            }
        });
    });

    describe('on hand-built rows', () => {
        let db: LibraryDatabase;

        beforeEach(() => {
            db = openDatabase(':memory:');
            ensureSchema(db);
        });

        afterEach(() => {
            db.close();
        });

        function insertSingleTrackArtists(popularities: Record<string, number>): void {
            const insertArtist = db.prepare<[string, string]>('INSERT INTO artists (artist_id, name) VALUES (?, ?)');
            const insertAlbum = db.prepare<[string, string, string]>(
                'INSERT INTO albums (album_id, name, artist_id) VALUES (?, ?, ?)'
            );
            const insertTrack = db.prepare<[string, string, string, number]>(
                'INSERT INTO tracks (track_id, name, album_id, popularity, duration_ms, explicit) VALUES (?, ?, ?, ?, 1000, 0)'
            );
            for (const [name, popularity] of Object.entries(popularities)) {
                insertArtist.run(`artist-${name}`, name);
                insertAlbum.run(`album-${name}`, `${name} Album`, `artist-${name}`);
                insertTrack.run(`track-${name}`, `${name} Track`, `album-${name}`, popularity);
            }
        }

        it('places single tracks at 90 and 70 in the superstar and rising tiers', () => {
            insertSingleTrackArtists({ X: 90, Y: 70 });

            expect(getArtistPopularityTiers(db)).toEqual([
                { artist_name: 'Y', avg_popularity: 70, popularity_level: '⭐ Rising Artist' },
                { artist_name: 'X', avg_popularity: 90, popularity_level: '🔥 Superstar' },
            ]);
        });

        it('includes the boundary values 80 and 60 in the higher tier', () => {
            insertSingleTrackArtists({ Edge: 80, Mid: 60, Low: 59 });

            expect(getArtistPopularityTiers(db)).toEqual([
                { artist_name: 'Low', avg_popularity: 59, popularity_level: '🌱 Underrated Gem' },
                { artist_name: 'Mid', avg_popularity: 60, popularity_level: '⭐ Rising Artist' },
                { artist_name: 'Edge', avg_popularity: 80, popularity_level: '🔥 Superstar' },
            ]);
        });

        it('averages several tracks of one artist before choosing the tier', () => {
            db.exec(`
                INSERT INTO artists (artist_id, name) VALUES ('artist-x', 'X');
                INSERT INTO albums (album_id, name, artist_id) VALUES ('album-x', 'X Album', 'artist-x');
                INSERT INTO tracks (track_id, name, album_id, popularity, duration_ms, explicit) VALUES
                    ('track-x1', 'X One', 'album-x', 95, 1000, 0),
                    ('track-x2', 'X Two', 'album-x', 85, 1000, 0);
            `);

            expect(getArtistPopularityTiers(db)).toEqual([
                { artist_name: 'X', avg_popularity: 90, popularity_level: '🔥 Superstar' },
            ]);
        });

        it('gives tied artists the same rank with no gap after them', () => {
            db.exec(`
                INSERT INTO artists (artist_id, name) VALUES ('artist-a', 'A'), ('artist-b', 'B'), ('artist-c', 'C');
                INSERT INTO albums (album_id, name, artist_id) VALUES
                    ('album-a', 'A Album', 'artist-a'),
                    ('album-b', 'B Album', 'artist-b'),
                    ('album-c', 'C Album', 'artist-c');
                INSERT INTO tracks (track_id, name, album_id, popularity, duration_ms, explicit) VALUES
                    ('track-a', 'A', 'album-a', 60, 1000, 0),
                    ('track-b', 'B', 'album-b', 60, 1000, 0),
                    ('track-c', 'C', 'album-c', 40, 1000, 0);
            `);

            expect(getArtistPopularityRanking(db).map((row) => [row.artist_name, row.rank_position])).toEqual([
                ['A', 1],
                ['B', 1],
                ['C', 2],
            ]);
        });
    });

    describe('runReadOnly', () => {
        it('refuses statements that would write', () => {
            const db = openDatabase(':memory:');
            ensureSchema(db);
            db.exec(`INSERT INTO artists (artist_id, name) VALUES ('artist-1', 'Test Artist')`);

            expect(() => runReadOnly(db, 'wipeArtists', 'DELETE FROM artists')).toThrow(MutatingQueryError);
            expect(runReadOnly<{ count: number }>(db, 'countArtists', 'SELECT COUNT(*) AS count FROM artists')).toEqual([
                { count: 1 },
            ]);
            db.close();
        });
    });

    it('recognises registered query names', () => {
        expect(isLibraryQueryName('tracksPerPlaylist')).toBe(true);
        expect(isLibraryQueryName('dropEverything')).toBe(false);
    });
});
