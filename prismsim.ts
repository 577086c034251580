/**
 * prismsim - run a PRISM program file on the cycle emulator
 *
 * Usage:
 *   ./node_modules/.bin/esbuild --bundle prismsim.ts --platform=node --format=esm | node --input-type=module - <program.json>
 *   # or: npm run sim -- <program.json>
 *
 * Options:
 *   --cycles N      Clock cycles to run (default 16)
 *   --inputs a,b,c  Input stimulus, one value per cycle, repeating (overrides the file)
 *   --disasm        Show the loaded tables
 *   --json          Output the cycle history as JSON
 *   --quiet         Only show errors
 */
import { readFileSync } from 'fs';
import { PrismPeripheral } from './src/core/periph';
import { parseProgram, loadProgram, parseWord } from './src/core/program';
import type { PrismProgram } from './src/core/program';
import { disassembleTable } from './src/core/disassembler';
import { createSessionStore } from './src/stores/sessionStore';
import { hex } from './src/core/constants';
import type { ShardIndex } from './src/core/types';

// ---- Argument parsing ----

const args = process.argv.slice(2);
const flags = new Set(args.filter(a => a.startsWith('--') && !a.includes('=')));
const files: string[] = [];
const options = new Map<string, string>();
for (let i = 0; i < args.length; i++) {
  const a = args[i];
  if (a === '--cycles' || a === '--inputs') {
    options.set(a, args[++i] ?? '');
  } else if (!a.startsWith('--')) {
    files.push(a);
  }
}

if (files.length === 0) {
  console.error('prismsim - PRISM programmable FSM emulator');
  console.error('');
  console.error('Usage: prismsim <program.json> [options]');
  console.error('');
  console.error('Options:');
  console.error('  --cycles N      Clock cycles to run (default 16)');
  console.error('  --inputs a,b,c  Input stimulus, one value per cycle, repeating');
  console.error('  --disasm        Show the loaded tables');
  console.error('  --json          Output the cycle history as JSON');
  console.error('  --quiet         Only show errors');
  process.exit(1);
}

const disasm = flags.has('--disasm');
const jsonOut = flags.has('--json');
const quiet = flags.has('--quiet');

function fail(message: string): never {
  console.error(`\x1b[31m✗ ${message}\x1b[0m`);
  process.exit(1);
}

function toNum(text: string, where: string): number {
  try {
    return parseWord(text, where);
  } catch (err) {
    fail(err instanceof Error ? err.message : String(err));
  }
}

// ---- Load ----

const filePath = files[0];
let program: PrismProgram;
let periph: PrismPeripheral;
try {
  program = parseProgram(JSON.parse(readFileSync(filePath, 'utf-8')));
  periph = new PrismPeripheral(program.config);
  loadProgram(periph, program);
} catch (err) {
  fail(`${filePath}: ${err instanceof Error ? err.message : String(err)}`);
}

const cyclesOpt = options.get('--cycles');
const cycles = cyclesOpt === undefined ? 16 : toNum(cyclesOpt, '--cycles');
const inputsOpt = options.get('--inputs');
const stimulus = inputsOpt !== undefined ? inputsOpt.split(',').map((v, i) => toNum(v, `--inputs[${i}]`)) : program.inputs;

const { engine, config } = periph;

// ---- Disassembly ----

if (disasm && !quiet) {
  engine.tables.forEach((table, t) => {
    console.log(`  \x1b[1mTable ${t}:\x1b[0m`);
    for (const line of disassembleTable(table.toArray(), config)) {
      console.log(`    ${line}`);
    }
  });
  console.log('');
}

// ---- Run ----

const session = createSessionStore();
const shards: ShardIndex[] = engine.fracture ? [0, 1] : [0];
session.getState().setStatus('running');

for (let i = 0; i < cycles; i++) {
  if (stimulus.length > 0) periph.setInputs(stimulus[i % stimulus.length]);
  const wasHalted = shards.map(s => engine.getShardStatus(s).halted);
  periph.clock();

  const snap = engine.getSnapshot();
  const [s0, s1] = snap.shards;
  session.getState().record({
    cycle: snap.cycle,
    inputs: snap.inputs,
    indices: [s0.index, s1.index],
    outputs: snap.outputs,
    condOutputs: snap.condOutputs,
    rules: [s0.lastRule, s1.lastRule],
  });
  shards.forEach((s, j) => {
    const status = snap.shards[s];
    if (status.halted && !wasHalted[j]) session.getState().noteHalt(s, status.index, snap.cycle);
  });
}

const { history, halts } = session.getState();

if (jsonOut) {
  console.log(JSON.stringify({ file: filePath, config, history, halts }, null, 2));
  process.exit(0);
}

if (quiet) {
  console.log(`\x1b[32m✓ ${filePath}\x1b[0m`);
  process.exit(0);
}

console.log(`\x1b[32m✓ ${filePath}\x1b[0m - ${cycles} cycles${engine.fracture ? ' (fractured)' : ''}`);
console.log('');
const outDigits = config.outputWidth;
for (const rec of history) {
  const idx = engine.fracture ? `${rec.indices[0]}/${rec.indices[1]}` : `${rec.indices[0]}`;
  const rules = engine.fracture ? `${rec.rules[0] ?? '-'}/${rec.rules[1] ?? '-'}` : `${rec.rules[0] ?? '-'}`;
  console.log(
    `  ${String(rec.cycle).padStart(5)}  in=${hex(rec.inputs, 2)}` +
    `  si=${idx.padEnd(5)} out=${rec.outputs.toString(2).padStart(outDigits, '0')}` +
    ` cond=${rec.condOutputs.toString(2)}  ${rules}`,
  );
}
for (const h of halts) {
  console.log(`  \x1b[33mshard ${h.shard} halted at SI ${h.index} (cycle ${h.cycle})\x1b[0m`);
}
