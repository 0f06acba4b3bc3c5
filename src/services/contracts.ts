/**
 * Service Layer Contracts
 *
 * Defines the interfaces between the surfaces (CLI, HTTP handlers) and the
 * engine. Surfaces MUST use these services instead of wiring the engine
 * themselves.
 */

import type { EngineSettings } from '../engine/PairedStreamEngine.js';
import type { DiagnosticListener, EngineStats, ExtractionProfile, LineSink } from '../types/index.js';

/**
 * A sink the driving loop can flush between input chunks and wait on
 * when the destination applies backpressure.
 */
export interface StreamingLineSink extends LineSink {
    flush?(): void;
    drain?(): Promise<void>;
}

export interface ConversionRequest {
    /** Profile name (built-in or from config.json) or a profile object. */
    profile?: string | ExtractionProfile;
    settings?: Partial<EngineSettings>;
    onDiagnostic?: DiagnosticListener;
    /** Shown in read error messages. */
    sourceName?: string;
}

export interface ConversionResult {
    profile: string;
    stats: Readonly<EngineStats>;
}

/**
 * Conversion service - runs one document through the engine
 */
export interface ConversionService {
    convert(
        input: AsyncIterable<string | Buffer>,
        sink: StreamingLineSink,
        request?: ConversionRequest
    ): Promise<ConversionResult>;

    listProfiles(): ExtractionProfile[];

    resolveProfile(name: string): ExtractionProfile;
}
