// src/simulation/runScheduleDemo.ts

import { loadConfig } from '../config';
import { findBestTimes } from '../engine/slotMatcher';
import { LlmScheduleExtractor, createLlmClient } from '../extraction/availabilityExtractor';
import type { ParticipantSchedule } from '../models/ParticipantSchedule';
import { ConsoleLogger } from '../utils/logger';
import { describeCoverage, formatRecommendations } from './formatRecommendations';

/**
 * Scheduling demo against a live model
 *
 * Runs a fixed group of participants through extraction and matching and
 * prints the ranked times. Needs the configured LLM endpoint to be up.
 */

const SAMPLE_MESSAGES = [
    'I am available every morning from 9 to 11 AM, except on Wednesdays.',
    'I am free on Tuesdays, but if possible, I prefer an early morning slot. Maybe 10am',
    'I already have a meeting booked on Friday from 2 to 4 PM.'
];

function logSection(title: string): void {
    console.log('\n' + '='.repeat(80));
    console.log(title);
    console.log('='.repeat(80) + '\n');
}

async function runDemo(): Promise<void> {
    const config = loadConfig();
    const logger = new ConsoleLogger(config.logLevel);
    const extractor = new LlmScheduleExtractor(createLlmClient(config.llm), config.llm);

    logSection(`SCHEDULING DEMO - ${SAMPLE_MESSAGES.length} participants, model ${config.llm.model}`);

    const schedules: ParticipantSchedule[] = [];
    for (const [index, message] of SAMPLE_MESSAGES.entries()) {
        logger.info(`Processing participant ${index + 1}: "${message}"`);
        const schedule = await extractor.extract(message);
        schedules.push(schedule);
        logger.info(`  ${describeCoverage(schedule)}`);
    }

    logSection('Recommended Meeting Times (Ranked by Preference)');
    for (const line of formatRecommendations(findBestTimes(schedules))) {
        console.log(line);
    }
}

if (require.main === module) {
    runDemo().catch((error: unknown) => {
        console.error('Demo failed:', error instanceof Error ? error.message : error);
        process.exitCode = 1;
    });
}
