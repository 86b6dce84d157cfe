/**
 * Capture Sample Packets Script
 * =============================
 *
 * Listens to a live game until one datagram of every packet type has been
 * seen, then writes them as <packet-name>.bin files.
 *
 * Run with: npx tsx scripts/capturePackets.ts [output-dir] [max-datagrams]
 */

import * as path from 'path';
import { fileURLToPath } from 'url';
import {
    parseCaptureLimit,
    resolveListenerConfig,
} from '../src/lib/config/listenerConfig';
import { TelemetryListener } from '../src/lib/connection/TelemetryListener';
import { samplesLog } from '../src/lib/logger';
import { isPacketDecodeError } from '../src/lib/packets/errors';
import { encodePacket } from '../src/lib/packets/PacketRegistry';
import { SamplePacketStore } from '../src/lib/samples/SamplePacketStore';

// ESM-compatible __dirname
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// ============================================================================
// CONFIGURATION
// ============================================================================

const OUTPUT_DIR = process.argv[2] ?? path.join(__dirname, '../samples');
const MAX_DATAGRAMS = parseCaptureLimit(process.argv[3]);

const listener = new TelemetryListener({ config: resolveListenerConfig() });
const store = new SamplePacketStore(OUTPUT_DIR);

try {
    await listener.bind();
} catch (err) {
    samplesLog.error('Unable to setup connection', err);
    process.exit(127);
}

let seen = 0;
while (!store.isComplete() && seen < MAX_DATAGRAMS) {
    seen++;
    try {
        const decoded = await listener.receiveOne();
        const name = store.add(encodePacket(decoded));
        samplesLog.debug(`Captured ${name} (${store.names().length} type(s))`);
    } catch (err) {
        if (!isPacketDecodeError(err)) throw err;
        samplesLog.warn(`Skipping datagram: ${err.message}`);
    }
}

await listener.close();

const missing = store.missing();
if (missing.length > 0) {
    samplesLog.warn(`No sample seen for: ${missing.join(', ')}`);
}
await store.save();
