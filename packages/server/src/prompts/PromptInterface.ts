export abstract class AnalysisPrompt<TInput> {
    protected readonly jsonOnlyRules = [
        '- Return STRICT JSON only.',
        '- No markdown, no code fences, no explanation outside the JSON object.',
        '- Use exactly the keys shown in the schema, spelled verbatim.'
    ].join('\n');

    protected orPlaceholder(value: string | null | undefined, placeholder: 'unknown' | 'none'): string {
        const trimmed = value?.trim();
        return trimmed ? trimmed : placeholder;
    }

    protected joinOrNone(values: readonly string[], separator = ', '): string {
        return values.length > 0 ? values.join(separator) : 'none';
    }

    abstract build(input: TInput): string;
}
