import dotenv from 'dotenv';
dotenv.config();

import { getConfig } from '../src/config';
import { createDependencies } from '../src/presentation/app';
import { JsonScriptSource } from '../src/infrastructure/script/JsonScriptSource';

/**
 * Composes a script file with the configured asset pool and prints the timeline.
 *
 * Usage: tsx scripts/compose_script.ts [script.json] [--coverage]
 */
async function composeScript(): Promise<void> {
    const args = process.argv.slice(2);
    const scriptPath = args.find((arg) => !arg.startsWith('--')) ?? 'examples/sample_script.json';
    const config = getConfig();
    const { useCase, coverageService } = createDependencies(config);

    const sections = await new JsonScriptSource(scriptPath).loadSections();

    if (args.includes('--coverage')) {
        const report = await coverageService.analyzeCoverage(sections);
        console.log(JSON.stringify(report, null, 2));
        return;
    }

    const { compositionId, plan } = await useCase.execute({ sections });

    console.log(`\n🎞️ Composition ${compositionId} (${plan.totalDurationSeconds}s)`);
    for (const entry of plan.entries) {
        const transition = entry.inboundTransition
            ? `${entry.inboundTransition.effect} ${entry.inboundTransition.durationSeconds}s → `
            : '';
        console.log(
            `  ${transition}[${entry.section.index}] ${entry.section.label} ` +
            `energy=${entry.profile.energy} asset=${entry.chosenAsset?.id ?? '-'} ` +
            `(${entry.resolution}) motion=${entry.motionPlan?.movement ?? 'none'}`
        );
    }
    for (const deficiency of plan.deficiencies) {
        console.log(`  ⚠️ Section ${deficiency.sectionIndex}: ${deficiency.message}`);
    }
}

composeScript().catch((error) => {
    console.error('💥 Composition failed:', error);
    process.exit(1);
});
