import type { RegisteredTool, ToolArgs, ToolSchema } from '../types/index.js';
import { ToolInputError } from '../types/index.js';

export const WEATHER_REPORT = 'The weather is 75°F and sunny.';

export const weatherSchema: ToolSchema = {
  name: 'get_current_weather',
  description: 'Gets the current weather for a given location.',
  parameters: {
    location: { type: 'string', description: 'The city.', required: true },
  },
};

// Static data: the location is checked but does not change the report.
export function getCurrentWeather(args: ToolArgs): string {
  const location = args['location'];
  if (typeof location !== 'string' || location.trim().length === 0) {
    throw new ToolInputError('InvalidArguments', 'location must be a non-empty string', 'location');
  }
  return WEATHER_REPORT;
}

export const weatherTool: RegisteredTool = {
  schema: weatherSchema,
  run: getCurrentWeather,
};
