/**
 * Forecast payloads shaped like the Open-Meteo response
 */

export interface RawForecast {
  latitude?: number;
  longitude?: number;
  current_weather?: Record<string, unknown>;
  daily?: Record<string, unknown[]>;
}

export function lisbonForecast(): RawForecast {
  return {
    latitude: 38.72,
    longitude: -9.14,
    current_weather: {
      temperature: 21.3,
      windspeed: 13.0,
      winddirection: 290,
      weathercode: 1,
      time: '2025-04-04T14:00',
    },
    daily: {
      time: ['2025-04-04', '2025-04-05'],
      temperature_2m_max: [25.0, 24.0],
      temperature_2m_min: [15.0, 14.0],
      weathercode: [0, 61],
    },
  };
}

export function weekForecast(): RawForecast {
  return {
    current_weather: { temperature: 4.5, windspeed: 22.1, time: '2025-01-06T09:00' },
    daily: {
      time: [
        '2025-01-06', '2025-01-07', '2025-01-08', '2025-01-09',
        '2025-01-10', '2025-01-11', '2025-01-12',
      ],
      temperature_2m_max: [6.1, 5.4, 7.0, 3.2, 2.8, 4.4, 5.9],
      temperature_2m_min: [0.2, -1.1, 1.5, -2.4, -3.0, -0.6, 0.8],
      weathercode: [3, 45, 61, 71, 73, 2, 0],
    },
  };
}

export function toBody(payload: RawForecast): string {
  return JSON.stringify(payload);
}
