/**
 * SEED SCRIPT
 *
 * Populates sample customers, products and one sample order.
 *
 * Run this with: npm run seed
 */
import {makeAppEffects} from './effects/EffectsFactory';
import {seedDatabase} from './pure/seed';

async function run(): Promise<void> {
  const appEffects = await makeAppEffects();
  try {
    await seedDatabase()(appEffects);
  } finally {
    await appEffects.close();
  }
}

run().catch((error) => {
  console.error('❌ Seeding failed:', error);
  process.exit(1);
});
