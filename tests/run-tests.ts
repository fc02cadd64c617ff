import { setLogLevel } from '../src/core/Logger';
import { runTests as runAvoidance } from './avoidance.test';
import { runTests as runBotRunner } from './botRunner.test';
import { runTests as runCluster } from './cluster.test';
import { runTests as runColor } from './color.test';
import { runTests as runConfig } from './config.test';
import { runTests as runFarming } from './farming.test';
import { runTests as runMobs } from './mobs.test';
import { runTests as runPixelScan } from './pixelScan.test';
import { runTests as runSlots } from './slotDispatcher.test';
import { runTests as runStatistics } from './statistics.test';
import { runTests as runStatusBar } from './statusBar.test';
import { runTests as runTargetMarker } from './targetMarker.test';

async function main() {
  setLogLevel('error');
  try {
    runColor();
    runPixelScan();
    runCluster();
    runStatusBar();
    runMobs();
    runTargetMarker();
    runAvoidance();
    await runConfig();
    await runSlots();
    runStatistics();
    await runFarming();
    await runBotRunner();
    console.log('All tests passed');
    process.exit(0);
  } catch (e) {
    console.error('Tests failed:', e instanceof Error ? e.stack ?? e.message : String(e));
    process.exit(1);
  }
}

main();
