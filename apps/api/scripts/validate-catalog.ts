/**
 * Catalog Validation Script
 *
 * Validates a catalog revision (default: data/songs.json) against the facet
 * vocabularies without embedding anything. Exits non-zero if any entry is invalid.
 *
 * Usage: tsx scripts/validate-catalog.ts [path/to/songs.json]
 */

import path from 'path';
import { readCatalogFile } from '../src/catalog/loader.js';
import { CatalogStore } from '../src/catalog/store.js';
import { FacetIndex } from '../src/indexes/facet-index.js';
import { ValidationError } from '../src/errors.js';

const catalogPath = process.argv[2] ?? process.env.CATALOG_PATH ?? path.join('data', 'songs.json');

async function validateCatalog() {
  console.log(`\n🔍 Validating catalog: ${catalogPath}\n`);

  try {
    const store = CatalogStore.load(await readCatalogFile(catalogPath));
    const facets = FacetIndex.build(store.records());
    const options = facets.options();

    console.log(`📊 Songs: ${store.size}`);
    console.log(`   Moods used: ${options.mood.length}, activities: ${options.activity.length}, genres: ${options.genre.length}, vibe tags: ${options.vibe_tags.length}`);
    console.log(`✅ PASS: Catalog is valid\n`);
    process.exit(0);
  } catch (error) {
    if (!(error instanceof ValidationError)) {
      throw error;
    }

    console.error(`❌ FAIL: Found ${error.issues.length} problem(s)\n`);
    for (const issue of error.issues.slice(0, 20)) {
      const where = issue.index >= 0 ? `entry ${issue.index}` : 'catalog';
      console.error(`  - ${where}, ${issue.field}: ${issue.reason}`);
    }
    if (error.issues.length > 20) {
      console.error(`  ... and ${error.issues.length - 20} more`);
    }
    console.error('');
    process.exit(1);
  }
}

validateCatalog().catch((error) => {
  console.error('❌ Validation script error:', error);
  process.exit(1);
});
