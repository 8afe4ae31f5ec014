/**
 * Canned answer for when the prediction service cannot be reached.
 * Driven only by the season of the requested (or current) date.
 */

import { type Season, seasonOf } from '../../shared/runtime/city-time.js';
import type { Language, PredictionRequest, PredictionResult } from '../contracts/prediction.types.js';

type Outlook = 'winter' | 'summer' | 'moderate';

const OUTLOOK_NUMBERS: Record<Outlook, { aqi: number; traffic: number }> = {
  winter: { aqi: 160, traffic: 70 },
  summer: { aqi: 45, traffic: 50 },
  moderate: { aqi: 80, traffic: 60 },
};

const OUTLOOK_TEXT: Record<Language, Record<Outlook, string>> = {
  en: {
    winter: 'Winter conditions expected. High smog levels due to coal heating. Recommend indoor activities and public transport.',
    summer: 'Summer conditions expected. Good air quality. Traffic normal with vacation season reduction.',
    moderate: 'Moderate conditions expected. Normal traffic patterns and acceptable air quality.',
  },
  ru: {
    winter: 'Ожидаются зимние условия. Высокий уровень смога из-за угольного отопления. Рекомендуется меньше находиться на улице и пользоваться общественным транспортом.',
    summer: 'Ожидаются летние условия. Хорошее качество воздуха. Трафик в норме, в сезон отпусков немного ниже.',
    moderate: 'Ожидаются умеренные условия. Обычная загруженность дорог и приемлемое качество воздуха.',
  },
  kk: {
    winter: 'Қысқы жағдайлар күтілуде. Көмірмен жылыту салдарынан смог деңгейі жоғары. Үй ішінде болып, қоғамдық көлікті пайдалану ұсынылады.',
    summer: 'Жазғы жағдайлар күтілуде. Ауа сапасы жақсы. Көлік ағыны қалыпты, демалыс маусымында азаяды.',
    moderate: 'Орташа жағдайлар күтілуде. Жол жүктемесі қалыпты, ауа сапасы қолайлы.',
  },
};

const REASONING: Record<Language, (city: string) => string> = {
  en: (city) => `Based on historical seasonal patterns for ${city}`,
  ru: (city) => `На основе исторических сезонных закономерностей (${city})`,
  kk: (city) => `${city} үшін тарихи маусымдық заңдылықтар негізінде`,
};

export const FALLBACK_CONFIDENCE = 0.75;

function outlookFor(season: Season): Outlook {
  if (season === 'winter') return 'winter';
  if (season === 'summer') return 'summer';
  return 'moderate';
}

/**
 * @param currentMonth city-local month used when the request carries no date
 */
export function fallbackPrediction(request: PredictionRequest, city: string, currentMonth: number): PredictionResult {
  const month = request.date ? Number(request.date.slice(5, 7)) : currentMonth;
  const outlook = outlookFor(seasonOf(month));
  const language = request.language ?? 'en';

  return {
    prediction: OUTLOOK_TEXT[language][outlook],
    confidenceScore: FALLBACK_CONFIDENCE,
    aqiPrediction: OUTLOOK_NUMBERS[outlook].aqi,
    trafficIndexPrediction: OUTLOOK_NUMBERS[outlook].traffic,
    reasoning: REASONING[language](city),
    isSynthetic: true,
  };
}
