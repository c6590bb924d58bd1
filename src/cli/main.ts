#!/usr/bin/env node
import { resolveConfig } from "../config/SimulationConfig.js";
import { CVarRegistry } from "../console/CVarRegistry.js";
import { configFromCVars, registerSimCVars } from "../console/simCVarDefs.js";
import { SceneGenerator } from "../generation/SceneGenerator.js";
import { RainWorld } from "../host/RainWorld.js";
import { initSimLog, installCrashHandlers, simLog, simLogError } from "../host/simLog.js";
import { TickLoop } from "../host/TickLoop.js";
import { renderText } from "../render/textPreview.js";
import { loadSceneFile } from "../scene/sceneFile.js";
import type { SceneGeometry } from "../scene/SceneGeometry.js";
import { type CliOptions, parseCliOptions, USAGE } from "./cliArgs.js";

// Demo scene resolution, independent of the screen size
const DEMO_SCENE_WIDTH = 160;
const DEMO_SCENE_HEIGHT = 96;

let opts: CliOptions;
try {
  opts = parseCliOptions(process.argv.slice(2), process.env);
} catch (err) {
  console.error(err instanceof Error ? err.message : String(err));
  console.error(USAGE);
  process.exit(2);
}

if (opts.help) {
  console.log(USAGE);
  process.exit(0);
}

if (opts.logDir) initSimLog(opts.logDir);
installCrashHandlers();

const cvars = new CVarRegistry();
registerSimCVars(cvars);
const tickRateVar = cvars.get("host_tickrate");
tickRateVar?.set(opts.tickRate);
try {
  for (const assignment of opts.sets) cvars.assign(assignment);
} catch (err) {
  simLogError("bad --set", err);
  process.exit(2);
}

function loadScene(): SceneGeometry {
  if (opts.scene) {
    simLog(`Loading scene ${opts.scene}`);
    return loadSceneFile(opts.scene);
  }
  simLog(`Generating demo scene (seed "${opts.seed}")`);
  return new SceneGenerator(opts.seed).generate(DEMO_SCENE_WIDTH, DEMO_SCENE_HEIGHT);
}

const config = resolveConfig(configFromCVars(cvars));
const world = new RainWorld(loadScene(), opts.cols, opts.rows, { config, seed: opts.seed });
const interactive = process.stdout.isTTY === true;
let ticks = 0;

function drawPreview(): void {
  const frame = world.frame();
  const text = renderText(frame.cells, frame.width, frame.height);
  process.stdout.write(interactive ? `\x1b[H\x1b[2J${text}\n` : `${text}\n`);
}

function logStats(): void {
  const s = world.stats;
  simLog(
    `ticks=${s.ticks} live=${world.liveCount} spawned=${s.spawned} exits=${s.exits} ` +
      `surfaceHits=${s.surfaceHits} groundHits=${s.groundHits} splashes=${s.splashesSpawned} ` +
      `streams=${s.streamsSpawned} dropped=${s.droppedSpawns}`,
  );
}

const loop = new TickLoop(() => {
  world.tick();
  ticks++;
  const rate = Math.max(1, Math.round(tickRateVar?.get() ?? opts.tickRate));
  if (interactive && ticks % rate === 0) drawPreview();
  if (opts.ticks > 0 && ticks >= opts.ticks) {
    loop.stop();
    drawPreview();
    logStats();
  }
}, tickRateVar?.get() ?? opts.tickRate);

tickRateVar?.onChange((hz) => loop.setTickRate(hz));

simLog(`Running ${opts.cols}x${opts.rows} at ${tickRateVar?.get() ?? opts.tickRate} Hz`);
loop.start();

function shutdown() {
  simLog("Shutting down...");
  loop.stop();
  logStats();
  process.exit(0);
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
