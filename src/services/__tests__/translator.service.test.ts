import { beforeEach, describe, expect, it } from 'vitest';
import { FakeTranslation } from '../../__tests__/helpers';
import { splitLongText, TranslatorService } from '../translator.service';

describe('splitLongText', () => {
  it('keeps short text in one chunk with normalized punctuation', () => {
    expect(splitLongText('Hello world. How are you? Fine!')).toEqual(['Hello world. How are you. Fine.']);
  });

  it('packs sentences greedily up to the chunk size', () => {
    expect(splitLongText('One. Two. Three.', 10)).toEqual(['One. Two.', 'Three.']);
  });

  it('breaks a sentence longer than a chunk between words', () => {
    const chunks = splitLongText(Array(100).fill('sentence').join(' '), 100);
    expect(chunks).toHaveLength(10);
    expect(chunks.every((c) => c.length <= 100)).toBe(true);
    expect(chunks[0]).toBe(Array(11).fill('sentence').join(' '));
    expect(chunks[9]).toBe('sentence.');
  });

  it('returns nothing for blank text', () => {
    expect(splitLongText('  ...  ')).toEqual([]);
  });
});

describe('TranslatorService', () => {
  let provider: FakeTranslation;
  let translator: TranslatorService;

  beforeEach(() => {
    provider = new FakeTranslation();
    translator = new TranslatorService(provider);
  });

  it('translates with an explicit source', async () => {
    expect(await translator.translate('Hello', 'es', 'en')).toEqual({
      text: '[es] Hello',
      sourceLanguage: 'en',
      targetLanguage: 'es',
      translated: true,
    });
    expect(provider.calls).toEqual([{ text: 'Hello', target: 'es', source: 'en' }]);
  });

  it('returns text already in the target language unchanged', async () => {
    provider.detected = 'es';
    expect(await translator.translate('Hola', 'es')).toEqual({
      text: 'Hola',
      sourceLanguage: 'es',
      targetLanguage: 'es',
      translated: false,
    });
    expect(provider.calls).toEqual([]);
  });

  it('assumes English when detection fails', async () => {
    provider.detected = new Error('offline');
    const result = await translator.translate('Bonjour', 'fr');
    expect(result.sourceLanguage).toBe('en');
    expect(provider.calls).toEqual([{ text: 'Bonjour', target: 'fr', source: 'en' }]);
  });

  it('rejects empty text and unsupported targets', async () => {
    await expect(translator.translate('   ', 'es')).rejects.toThrow('Text is empty');
    await expect(translator.translate('Hello', 'xx')).rejects.toThrow("Language 'xx' not supported");
  });

  it('normalizes detected codes and returns null on failure', async () => {
    provider.detected = 'zh-CN';
    expect(await translator.detectLanguage('你好')).toBe('zh');
    provider.detected = new Error('offline');
    expect(await translator.detectLanguage('你好')).toBeNull();
  });

  it('translates a batch in order', async () => {
    const results = await translator.translateBatch(['one', 'two'], 'de', 'en');
    expect(results.map((r) => r.text)).toEqual(['[de] one', '[de] two']);
  });

  it('translates long text chunk by chunk', async () => {
    const result = await translator.translateLongText('One. Two. Three.', 'es', 'en', 10);
    expect(result.text).toBe('[es] One. Two. [es] Three.');
    expect(provider.calls).toHaveLength(2);
  });

  it('names languages', () => {
    expect(translator.getLanguageName('ja')).toBe('Japanese');
    expect(translator.getLanguageName('xx')).toBe('XX');
    expect(translator.isLanguageSupported('ko')).toBe(true);
    expect(translator.validateText('').valid).toBe(false);
  });

  it('offers no alternatives beyond the main translation', async () => {
    const result = await translator.translateWithAlternatives('Hello', 'it', 'en');
    expect(result.main.text).toBe('[it] Hello');
    expect(result.alternatives).toEqual([]);
  });
});
