/**
 * Conversion Service Implementation
 *
 * SSOT for running a document through the engine. The CLI and the HTTP
 * server both go through here.
 */

import { StringDecoder } from 'string_decoder';

import { CUSTOM_PROFILES, DEFAULT_PROFILE } from '../config.js';
import { StreamReadError } from '../engine/errors.js';
import { PairedStreamEngine } from '../engine/PairedStreamEngine.js';
import { listProfiles, resolveProfile } from '../engine/profiles.js';
import { scopedLogger } from '../logging/index.js';
import { SaxEventSource } from '../parsers/xml/index.js';

import type {
    ConversionRequest,
    ConversionResult,
    ConversionService,
    StreamingLineSink,
} from './contracts.js';
import type { ExtractionProfile } from '../types/index.js';

const logger = scopedLogger('CONVERSION');

class ConversionServiceImpl implements ConversionService {
    async convert(
        input: AsyncIterable<string | Buffer>,
        sink: StreamingLineSink,
        request: ConversionRequest = {}
    ): Promise<ConversionResult> {
        const profile = typeof request.profile === 'object'
            ? request.profile
            : this.resolveProfile(request.profile ?? DEFAULT_PROFILE);

        const engine = new PairedStreamEngine({
            ...request.settings,
            profile,
            sink,
            ...(request.onDiagnostic ? { onDiagnostic: request.onDiagnostic } : {}),
        });

        const source = new SaxEventSource((notification) => engine.handle(notification), {
            wantsText: (name) => engine.wantsText(name),
            maxTextLength: engine.settings.maxTextLength,
            ...(request.sourceName !== undefined ? { fileName: request.sourceName } : {}),
        });

        const decoder = new StringDecoder('utf8');
        const iterator = input[Symbol.asyncIterator]();
        let finished = false;

        try {
            for (;;) {
                let next: IteratorResult<string | Buffer>;
                try {
                    next = await iterator.next();
                } catch (error: unknown) {
                    const message = error instanceof Error ? error.message : String(error);
                    throw new StreamReadError(`Input stream failed: ${message}`, error);
                }
                if (next.done) {
                    finished = true;
                    break;
                }

                const chunk = next.value;
                source.write(typeof chunk === 'string' ? chunk : decoder.write(chunk));

                // Records already emitted stay valid whatever happens next
                sink.flush?.();
                await sink.drain?.();
            }

            const tail = decoder.end();
            if (tail !== '') {
                source.write(tail);
            }
            source.close();
        } finally {
            sink.flush?.();
            if (!finished && iterator.return) {
                // Release the input when the run stops early
                await iterator.return().catch((error: unknown) => {
                    logger.debug('Input did not close cleanly:', error);
                });
            }
        }

        const stats = engine.finish();
        logger.debug(`${profile.name}: ${stats.pairsEmitted} pairs in ${stats.blocksClosed} blocks`);
        return { profile: profile.name, stats };
    }

    listProfiles(): ExtractionProfile[] {
        return listProfiles(CUSTOM_PROFILES);
    }

    resolveProfile(name: string): ExtractionProfile {
        return resolveProfile(name, CUSTOM_PROFILES);
    }
}

export const conversionService = new ConversionServiceImpl();
