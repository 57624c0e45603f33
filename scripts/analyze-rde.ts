/**
 * Headless RDE analysis runner
 *
 * Usage: npx tsx scripts/analyze-rde.ts <request.json> [--debug] [--json]
 *
 * Loads an analysis request from JSON, runs the full analysis and prints a
 * summary. With --json the encoded result document is printed as well.
 */

import * as fs from 'fs';

import {
  RdeAnalyzer,
  decodeAnalysisRequest,
  encodeDocument,
  setDetonationDebug,
} from '../src/detonation';
import type { MeshCellCounts, MeshSizingConsumer } from '../src/detonation';

// Parse command line args
const args = process.argv.slice(2);
const files = args.filter((arg) => !arg.startsWith('--'));
if (files.length < 1) {
  console.log('Usage: npx tsx scripts/analyze-rde.ts <request.json> [--debug] [--json]');
  console.log('  request.json: Path to analysis request JSON file');
  console.log('  --debug: Enable detonation model debug logging');
  console.log('  --json: Print the encoded result document');
  process.exit(1);
}

const requestFile = files[0];
if (args.includes('--debug')) {
  setDetonationDebug(true);
}

console.log(`Loading request from: ${requestFile}`);
const decoded = decodeAnalysisRequest(fs.readFileSync(requestFile, 'utf-8'));
if (!decoded.ok) {
  console.error(`[ERROR] Invalid request: ${decoded.error}`);
  process.exit(1);
}
const request = decoded.value;

// Stand-in for the case manager: report what it would write
const meshConsumer: MeshSizingConsumer = {
  applyCellCounts(counts: MeshCellCounts) {
    console.log(`[Mesh] Recommended cells: ${counts.radialCells} r × ${counts.circumferentialCells} θ × ${counts.axialCells} z`);
  },
};

const analyzer = new RdeAnalyzer();
const outcome = analyzer.analyze(request, meshConsumer);
if (!outcome.ok) {
  console.error(`[ERROR] Analysis failed: ${outcome.error.message}`);
  for (const note of outcome.error.notes) {
    console.error(`  - ${note}`);
  }
  process.exit(1);
}
const result = outcome.value;
const { chemistry, operatingPoint, mesh, structure, waveSystem } = result;

console.log('\n=== Mixture ===');
console.log(`${chemistry.fuelType}/${chemistry.oxidizerType}, φ = ${chemistry.equivalenceRatio}`);
console.log(`C-J: D = ${chemistry.detonationVelocity.toFixed(0)} m/s, ` +
  `P = ${(chemistry.detonationPressure / 1e5).toFixed(2)} bar, T = ${chemistry.detonationTemperature.toFixed(0)} K`);
console.log(`Cell size: ${(chemistry.cellSize * 1000).toFixed(3)} mm (${result.prediction.method}), ` +
  `uncertainty ${(result.uncertainty * 100).toFixed(1)}%`);

console.log('\n=== Mesh ===');
for (const check of [mesh.radial, mesh.circumferential, mesh.axial]) {
  console.log(`${check.axis.padEnd(16)} ${check.cells} cells, Δx = ${(check.cellSize * 1000).toFixed(4)} mm ` +
    `${check.passed ? 'PASS' : `FAIL (need ${check.minimumCells})`}`);
}

console.log(`2D structure (λ_eff = ${(result.mesh2D.cellSize * 1000).toFixed(3)} mm): ${result.mesh2D.passed ? 'PASS' : 'FAIL'}`);

console.log('\n=== Waves ===');
console.log(`Mean 2D cell size: ${(structure.meanCellSize * 1000).toFixed(3)} mm, curvature +${(structure.curvatureEffect * 100).toFixed(2)}%`);
console.log(`${waveSystem.waveCount} wave(s), ${waveSystem.wavePattern}, stability ${waveSystem.stabilityIndex}, ` +
  `${waveSystem.systemFrequency.toFixed(0)} Hz`);
console.log(`${result.injection.length} injector interactions (${result.injection[0]?.interactionType ?? 'none'})`);

console.log('\n=== Performance ===');
console.log(`Thrust ${operatingPoint.thrust.toFixed(1)} N, Isp ${operatingPoint.specificImpulse.toFixed(1)} s, ` +
  `pressure gain ${operatingPoint.pressureGain.toFixed(2)}`);

if (result.warningMessages.length > 0 || result.notes.length > 0) {
  console.log('\n=== Warnings ===');
  for (const message of [...result.warningMessages, ...result.notes]) {
    console.log(`- ${message}`);
  }
}

if (result.recommendations.length > 0) {
  console.log('\n=== Recommendations ===');
  for (const recommendation of result.recommendations) {
    console.log(`- ${recommendation}`);
  }
}

if (args.includes('--json')) {
  console.log('\n=== Result Document ===');
  console.log(encodeDocument(result));
}
