export type AnalysisSource = 'llm' | 'fallback';

export interface AnalysisOutput<T> {
    result: T;
    source: AnalysisSource;
}

export interface AnalysisEnvelope<T> {
    ok: true;
    data: T;
    source: AnalysisSource;
    generated_at: string;
}

export interface ErrorEnvelope {
    ok: false;
    error: string;
}

export function toEnvelope<T>(output: AnalysisOutput<T>, now: Date = new Date()): AnalysisEnvelope<T> {
    return {
        ok: true,
        data: output.result,
        source: output.source,
        generated_at: now.toISOString()
    };
}
