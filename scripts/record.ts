/**
 * Telemetry Recorder
 * ==================
 *
 * Prints every packet the game sends, as canonical text.
 * Run with: npx tsx scripts/record.ts
 *
 * Host/port: F1_TELEMETRY_HOST, F1_TELEMETRY_PORT (default 0.0.0.0:20777)
 */

import { resolveListenerConfig } from '../src/lib/config/listenerConfig';
import { TelemetryListener } from '../src/lib/connection/TelemetryListener';
import { recorderLog } from '../src/lib/logger';
import { runRecorder } from '../src/lib/recorder/runRecorder';

/** Exit status when the socket cannot be opened */
const EXIT_BIND_FAILURE = 127;

const config = resolveListenerConfig();
const listener = new TelemetryListener({ config });

try {
    await listener.bind();
} catch (err) {
    recorderLog.error('Unable to setup connection', err);
    recorderLog.error('Failed to open connector, stopping.');
    process.exit(EXIT_BIND_FAILURE);
}

const controller = new AbortController();
process.once('SIGINT', () => {
    controller.abort();
    void listener.close();
});

const summary = await runRecorder({
    source: listener,
    write: (text) => process.stdout.write(`${text}\n`),
    signal: controller.signal,
});

await listener.close();
recorderLog.info(`Printed ${summary.printed} packet(s), skipped ${summary.skipped}`);
