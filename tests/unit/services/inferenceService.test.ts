import { describe, it, expect, beforeEach } from 'vitest';
import { InferenceService } from '../../../src/services/inferenceService.js';
import { GenerationError, ModelLoadError, TokenizationError } from '../../../src/errors/inference.js';
import { LLMError } from '../../../src/errors/base.js';
import { BOS, EOS, FakeModelBackend, charId } from '../../fixtures/fakeModelBackend.js';
import { captureLogs, silentLogger } from '../../fixtures/logCapture.js';

describe('InferenceService', () => {
  let backend: FakeModelBackend;
  let service: InferenceService;

  beforeEach(async () => {
    backend = new FakeModelBackend();
    service = await InferenceService.load({
      modelId: 'test/tiny-model',
      backend,
      logger: silentLogger(),
    });
  });

  // ── load ───────────────────────────────────────────────────────────────────

  describe('load', () => {
    it('loads tokenizer and model for the given id', () => {
      expect(backend.loadedIds).toEqual(['test/tiny-model', 'test/tiny-model']);
      expect(service.modelId).toBe('test/tiny-model');
    });

    it('rejects with ModelLoadError naming the model and keeping the cause', async () => {
      const failing = new FakeModelBackend();
      const cause = new Error('ENOTFOUND huggingface.co');
      failing.loadFailure = cause;

      const error = await InferenceService.load({
        modelId: 'missing/model',
        backend: failing,
        logger: silentLogger(),
      }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ModelLoadError);
      expect(error).toBeInstanceOf(LLMError);
      expect(error).toMatchObject({
        message: "Failed to load model 'missing/model'",
        code: 'MODEL_LOAD_FAILED',
        cause,
      });
    });

    it('logs load start and completion', async () => {
      const { logger, lines } = captureLogs('info');
      await InferenceService.load({ modelId: 'test/tiny-model', backend, logger });
      expect(lines.map((line) => line['msg'])).toEqual(['Loading model', 'Model loaded']);
      expect(lines[0]).toMatchObject({ module: 'inference', modelId: 'test/tiny-model' });
    });
  });

  // ── generate ───────────────────────────────────────────────────────────────

  describe('generate', () => {
    it('returns prompt plus continuation with special tokens stripped', async () => {
      await expect(service.generate('Hi', 3)).resolves.toBe('Hi!!!');
    });

    it('passes the prompt ids and sampling options to the model', async () => {
      await service.generate('Hi', 7);
      expect(backend.model.calls).toEqual([
        {
          inputIds: [BOS, charId('H'), charId('i')],
          options: { maxNewTokens: 7, doSample: true },
        },
      ]);
    });

    it('wraps model failures in GenerationError', async () => {
      const cause = new Error('gpu oom');
      backend.model.failure = cause;
      const error = await service.generate('Hi', 3).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(GenerationError);
      expect(error).toMatchObject({ message: 'Text generation failed', cause });
    });

    it('wraps tokenizer failures during generation in GenerationError', async () => {
      backend.tokenizer.failOnEncode = true;
      await expect(service.generate('Hi', 3)).rejects.toBeInstanceOf(GenerationError);
    });

    it('never runs two model calls at once', async () => {
      backend.model.delayMs = 5;
      await Promise.all([service.generate('a', 1), service.generate('b', 1), service.generate('c', 1)]);
      expect(backend.model.maxActive).toBe(1);
      expect(backend.model.calls.map((call) => call.inputIds[1])).toEqual([
        charId('a'),
        charId('b'),
        charId('c'),
      ]);
    });

    it('does not log the prompt', async () => {
      const { logger, lines } = captureLogs('debug');
      const verbose = await InferenceService.load({ modelId: 'test/tiny-model', backend, logger });
      await verbose.generate('confidential prompt', 2);
      const call = lines.find((line) => line['msg'] === 'Generate called');
      expect(call).toMatchObject({ maxTokens: 2, promptLength: 19 });
      expect(call).not.toHaveProperty('prompt');
    });
  });

  // ── encode / decode ────────────────────────────────────────────────────────

  describe('encode', () => {
    it('encodes without special tokens', async () => {
      await expect(service.encode('Hey')).resolves.toEqual([charId('H'), charId('e'), charId('y')]);
    });

    it('wraps tokenizer failures in TokenizationError', async () => {
      backend.tokenizer.failOnEncode = true;
      const error = await service.encode('Hey').catch((err: unknown) => err);
      expect(error).toBeInstanceOf(TokenizationError);
      expect(error).toMatchObject({ message: 'Failed to encode text', code: 'TOKENIZATION_FAILED' });
    });
  });

  describe('decode', () => {
    it('strips special tokens', async () => {
      await expect(service.decode([BOS, charId('o'), charId('k'), EOS])).resolves.toBe('ok');
    });

    it('wraps unknown ids in TokenizationError', async () => {
      const error = await service.decode([-1]).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(TokenizationError);
      expect(error).toMatchObject({
        message: 'Failed to decode tokens',
        cause: expect.any(RangeError),
      });
    });

    it('round-trips token ids through decode and encode', async () => {
      const tokens = await service.encode('Hello, wörld 👋');
      const again = await service.encode(await service.decode(tokens));
      expect(again).toEqual(tokens);
    });

    it('is idempotent after one decode/encode pass', async () => {
      const raw = [BOS, charId('a'), EOS, charId('b')];
      const once = await service.encode(await service.decode(raw));
      const twice = await service.encode(await service.decode(once));
      expect(once).toEqual([charId('a'), charId('b')]);
      expect(twice).toEqual(once);
    });
  });
});
