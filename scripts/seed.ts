import { getDb } from '../src/lib/database';
import { seedSampleData } from '../src/lib/services/seed';

async function main() {
    const db = await getDb();
    await seedSampleData(db);
}

main().catch((error) => {
    console.error('[seed] Failed:', error);
    process.exit(1);
});
