import path from 'node:path';
import type { MaterializeReport, PipelineReport, StageStatus } from './types.js';

type Print = (line: string) => void;

const ICONS: Record<StageStatus, string> = {
  succeeded: '✅',
  skipped: '⏭️ ',
  failed: '❌'
};

const relative = (file: string) => path.relative(process.cwd(), file) || file;

export function printPipelineReport(report: PipelineReport, print: Print = console.log): void {
  print(`\n📊 Stages for "${report.product}" (${relative(report.productDir)}):`);
  report.stages.forEach((stage) => {
    const detail = stage.status === 'failed' ? ` → ${stage.error ?? 'unknown error'}` : ` → ${relative(stage.artifactPath)}`;
    print(`${ICONS[stage.status]} ${stage.stage}${detail}`);
  });
}

export function printMaterializeReport(report: MaterializeReport, print: Print = console.log): void {
  print(
    `\n🖼️  ${report.kind}: ${report.succeeded} generated, ${report.skipped} skipped, ${report.failed} failed (${relative(report.outputDir)})`
  );
  report.entries
    .filter((entry) => entry.status === 'failed')
    .forEach((entry) => print(`   ❌ ${entry.id}: ${entry.error ?? 'unknown error'}`));
}
