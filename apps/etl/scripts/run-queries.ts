/**
 * Prints the analytical query catalog against the library database.
 * Run with: npm run queries [-- <queryName>]
 */
import { loadStorageEnv } from '../src/env';
import { setLogLevel } from '../src/lib/logger';
import { openDatabase } from '../src/lib/database';
import { LIBRARY_QUERIES, isLibraryQueryName, type LibraryQueryName } from '../src/services/library-queries';

function main() {
    const env = loadStorageEnv();
    setLogLevel(env.LOG_LEVEL);
    const requested = process.argv[2];

    let names: LibraryQueryName[];
    if (!requested) {
        names = Object.keys(LIBRARY_QUERIES).filter(isLibraryQueryName);
    } else if (isLibraryQueryName(requested)) {
        names = [requested];
    } else {
        console.error(`Unknown query "${requested}". Available queries:`);
        console.error(Object.keys(LIBRARY_QUERIES).join('\n'));
        process.exitCode = 1;
        return;
    }

    const db = openDatabase(env.DATABASE_PATH, { readonly: true });

    try {
        names.forEach((name, index) => {
            const query = LIBRARY_QUERIES[name];
            console.log(`\n${index + 1}. ${query.description} (${name})`);
            console.table(query.run(db));
        });
    } finally {
        db.close();
    }
}

try {
    main();
} catch (error) {
    console.error('Query run failed:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
}
