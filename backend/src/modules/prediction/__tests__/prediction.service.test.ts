import { describe, it, expect, vi } from 'vitest';
import { PredictionService } from '../services/prediction.service.js';
import { BackgroundTasks } from '../../shared/runtime/background-tasks.js';
import { InMemoryCityRepository } from '../../history/storage/memory.repository.js';
import type { PredictionRequest, PredictionResult } from '../contracts/prediction.types.js';

const answer: PredictionResult = {
  prediction: 'Moderate smog tonight.',
  confidenceScore: 0.8,
  aqiPrediction: 130,
  trafficIndexPrediction: 62,
  reasoning: 'Inversion expected',
  isSynthetic: false,
};

describe('PredictionService', () => {
  it('enriches the question with live readings before forwarding it', async () => {
    const predict = vi.fn(async (_request: PredictionRequest) => answer);
    const service = new PredictionService({
      dashboard: { getLiveConditions: async () => ({ aqi: 142, congestionIndex: 71.5, temperature: -9.2 }) },
      predictor: { predict },
      repository: new InMemoryCityRepository(),
      tasks: new BackgroundTasks(),
    });

    const result = await service.ask({ query: 'Air tonight?', language: 'en' });

    expect(result).toEqual(answer);
    expect(predict).toHaveBeenCalledWith(
      { query: 'Air tonight?', language: 'en', liveAqi: 142, liveTraffic: 71.5, liveTemp: -9.2 },
      {},
    );
  });

  it('logs the exchange in the background', async () => {
    const repository = new InMemoryCityRepository();
    const tasks = new BackgroundTasks();
    const service = new PredictionService({
      dashboard: { getLiveConditions: async () => ({ aqi: 50, congestionIndex: 20, temperature: 18 }) },
      predictor: { predict: async () => answer },
      repository,
      tasks,
    });

    await service.ask({ date: '2025-05-01' });
    await tasks.drain();

    const [entry] = repository.recentPredictionLogs();
    expect(entry.request).toEqual({ date: '2025-05-01', liveAqi: 50, liveTraffic: 20, liveTemp: 18 });
    expect(entry.result).toEqual(answer);
  });

  it('still answers when the log write fails', async () => {
    const repository = new InMemoryCityRepository();
    vi.spyOn(repository, 'savePredictionLog').mockRejectedValue(new Error('disk full'));
    const tasks = new BackgroundTasks();
    const service = new PredictionService({
      dashboard: { getLiveConditions: async () => ({ aqi: 50, congestionIndex: 20, temperature: 18 }) },
      predictor: { predict: async () => answer },
      repository,
      tasks,
    });

    await expect(service.ask({})).resolves.toEqual(answer);
    await tasks.drain();
    expect(tasks.stats().failed).toBe(1);
  });
});
