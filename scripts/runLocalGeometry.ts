/**
 * Local harness for the geometry pipeline
 * Generates a GLB from a spec file, writes it, then reads it back
 *
 * Usage:
 *   npm run generate:local [spec-path] [output-path]
 *
 * Examples:
 *   npm run generate:local                                  # Uses fixtures/row-house.json
 *   npm run generate:local ./my-spec.json                   # Writes ./my-spec.glb
 *   npm run generate:local ./my-spec.json ./out/house.glb
 */

import 'dotenv/config';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { basename, extname, join, resolve } from 'path';
import { loadConfig } from '../src/config.js';
import { decodeGlb } from '../src/encoding/decodeGlb.js';
import { generateGeometry } from '../src/services/generateGeometry.js';
import { SpecValidationError } from '../src/utils/errors.js';

/**
 * Spec path from the command line, or the bundled row-house fixture
 */
function getSpecPath(): string {
  const specArg = process.argv[2];
  const specPath = specArg ? resolve(specArg) : join(__dirname, 'fixtures', 'row-house.json');
  if (!existsSync(specPath)) {
    throw new Error(`Spec file not found: ${specPath}`);
  }
  return specPath;
}

function getOutputPath(specPath: string): string {
  const outArg = process.argv[3];
  if (outArg) {
    return resolve(outArg);
  }
  return resolve(`${basename(specPath, extname(specPath))}.glb`);
}

function runLocalGeometry(): void {
  try {
    const config = loadConfig();
    const specPath = getSpecPath();
    const outputPath = getOutputPath(specPath);
    const raw: unknown = JSON.parse(readFileSync(specPath, 'utf8'));

    console.log('Running local geometry generation...');
    console.log(`Spec: ${specPath}`);
    console.log('');

    const result = generateGeometry(raw, {
      normalize: { limits: config.geometry.limits },
      build: {
        buildingDesignTypes: config.geometry.buildingDesignTypes,
        flatRoofDesignTokens: config.geometry.flatRoofDesignTokens,
        flatRoofSubtypeTokens: config.geometry.flatRoofSubtypeTokens,
      },
      includeNormals: config.geometry.includeNormals,
    });
    const glb = result.asset.toBuffer();
    writeFileSync(outputPath, glb);

    const decoded = decodeGlb(glb);

    console.log('Build stats:');
    console.log(JSON.stringify(result.stats, null, 2));
    if (result.warnings.length > 0) {
      console.log('Warnings:');
      for (const warning of result.warnings) {
        console.log(`  - ${warning}`);
      }
    }
    console.log('');
    console.log(`✅ Wrote ${outputPath}`);
    console.log(`   Size: ${glb.byteLength} bytes`);
    console.log(`   Vertices: ${decoded.positions.length}`);
    console.log(`   Triangles: ${decoded.faces.length}`);
    console.log(`   Normals: ${decoded.normals ? 'yes' : 'no'}`);
    console.log(`   Fallback: ${result.fallback ? 'yes' : 'no'}`);
    console.log(`   Time: ${result.generationTimeMs.toFixed(2)}ms`);
  } catch (error) {
    console.error('❌ Error running local geometry generation:');
    if (error instanceof SpecValidationError) {
      for (const issue of error.issues()) {
        console.error(`  ${issue.key}: ${issue.message}`);
      }
    } else if (error instanceof Error) {
      console.error(error.message);
      if (error.stack && process.env.DEBUG) {
        console.error(error.stack);
      }
    } else {
      console.error(error);
    }
    process.exit(1);
  }
}

runLocalGeometry();
