/**
 * WEATHER MODULE — Types
 * ======================
 */

export interface WeatherReading {
  temperature: number;   // °C
  feelsLike: number;     // °C
  humidity: number;      // %
  pressure: number;      // hPa
  windSpeed: number;     // m/s
  visibility: number;    // m
  description: string;
  icon: string;
  aqi: number;           // US EPA, 0..500
  city: string;
  country: string;
  timestamp: Date;
  isSynthetic: boolean;
}

/** Conditions as reported by the forecast endpoint, before AQI is attached. */
export type WeatherConditions = Omit<WeatherReading, 'aqi' | 'isSynthetic'>;

// ═══════════════════════════════════════════════════════════════
// WIRE FORMAT
// ═══════════════════════════════════════════════════════════════

export interface WeatherDto {
  temperature: number;
  feels_like: number;
  humidity: number;
  pressure: number;
  wind_speed: number;
  visibility: number;
  description: string;
  icon: string;
  aqi: number;
  city: string;
  country: string;
  timestamp: string;
  is_mock: boolean;
}

export function toWeatherDto(w: WeatherReading): WeatherDto {
  return {
    temperature: w.temperature,
    feels_like: w.feelsLike,
    humidity: w.humidity,
    pressure: w.pressure,
    wind_speed: w.windSpeed,
    visibility: w.visibility,
    description: w.description,
    icon: w.icon,
    aqi: w.aqi,
    city: w.city,
    country: w.country,
    timestamp: w.timestamp.toISOString(),
    is_mock: w.isSynthetic,
  };
}
