export const weatherReading = (entity: string, description: string, temperature: number) =>
    `The weather in ${entity} is ${description}, ${temperature}°.`;

export const weatherForecast = (entity: string, days: string[]) =>
    `The forecast for ${entity}: ${days.join('; ')}.`;

export const forecastDay = (day: number, description: string, temperature: number) =>
    `day ${day} ${description}, ${temperature}°`;

export const stockMovement = (symbol: string, price: string, movement: string) =>
    `${symbol} is trading at $${price}, ${movement} today.`;

export const headlineList = (items: string[], topic?: string) =>
    topic
        ? `Here are the latest headlines about ${topic}: ${items.join(' ')}`
        : `Here are the top headlines: ${items.join(' ')}`;

export const notFound = (entity: string) => `I couldn't find ${entity}.`;

export const noHeadlines = () => "I couldn't find any headlines right now.";

export const rateLimited = (service: string) =>
    `The ${service} service is getting too many requests right now. Please try again in a minute.`;

export const unreachable = (service: string) =>
    `I couldn't reach the ${service} service right now. Please try again later.`;

export const invalidKey = (service: string) =>
    `The ${service} service isn't configured correctly, so I can't look that up.`;

export const askForCity = () => 'Which city would you like the weather for?';

export const askForSymbol = () => 'Which company or ticker symbol would you like a quote for?';

export const supportedTopics = () =>
    'I can help with the weather, stock prices and the news. '
    + 'Try "What\'s the weather in London?", "What\'s the stock price of Apple?" '
    + 'or "Give me the latest news about technology."';

export const voiceNotUnderstood = () => "Sorry, I didn't catch that. Could you say it again?";

export const voiceUnavailable = () => "Sorry, I can't listen right now. Please type your question instead.";
