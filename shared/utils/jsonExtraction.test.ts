import { describe, expect, it, vi } from 'vitest';
import { extractFirstJsonObject } from './jsonExtraction';

describe('extractFirstJsonObject', () => {
    it('parses a bare JSON object', () => {
        expect(extractFirstJsonObject('{"title":"Deck","slides":[]}')).toEqual({ title: 'Deck', slides: [] });
    });

    it('skips prose and code fences around the object', () => {
        const text = 'Here is your plan:\n```json\n{"title":"Deck","slides":[{"title":"A"}]}\n```\nEnjoy!';
        expect(extractFirstJsonObject(text)).toEqual({ title: 'Deck', slides: [{ title: 'A' }] });
    });

    it('ignores braces inside string values', () => {
        const text = '{"title":"Use {braces} and \\"quotes\\"","slides":[]} trailing {junk}';
        expect(extractFirstJsonObject(text)).toEqual({ title: 'Use {braces} and "quotes"', slides: [] });
    });

    it('tolerates trailing commas', () => {
        expect(extractFirstJsonObject('{"title":"Deck","slides":[1,2,],}')).toEqual({ title: 'Deck', slides: [1, 2] });
    });

    it('skips a brace in the leading prose', () => {
        expect(extractFirstJsonObject('Plan for {topic}:\n{"title":"Deck","slides":[]}')).toEqual({ title: 'Deck', slides: [] });
    });

    it('skips an unclosed brace in the leading prose', () => {
        expect(extractFirstJsonObject('Open with { and then:\n{"title":"Deck"}')).toEqual({ title: 'Deck' });
    });

    it('throws when no candidate parses', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => { });

        expect(() => extractFirstJsonObject('Plan for {topic} and {audience}')).toThrow('Failed to parse extracted JSON object');
        expect(warn).toHaveBeenCalledWith('JSON Extraction Failed (Snippet):', '{audience}...');
        warn.mockRestore();
    });

    it('throws when there is no object', () => {
        expect(() => extractFirstJsonObject('no json here')).toThrow('No JSON object found in response');
    });

    it('throws when the object never closes', () => {
        expect(() => extractFirstJsonObject('{"title":"Deck"')).toThrow('could not find matching end brace');
    });
});
