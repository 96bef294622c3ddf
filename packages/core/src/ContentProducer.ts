// ContentProducer: turns an agent's decision into post text.
// The default producer fills templates; swap in another implementation
// through RunManager options.

import { Rng } from './Rng.js';
import type { ContentContext, ContentProducer } from './types.js';

export type Mood = 'bullish' | 'bearish' | 'neutral';

const TEMPLATES: Record<Mood, readonly string[]> = {
  bullish: [
    '{topic} odds look mispriced, loading up before everyone else notices',
    'Feeling {emotion} about {topic}. The crowd is finally waking up',
    'Bought more exposure to {topic} today. {trend} keeps pointing the same way',
    'Not selling a single contract on {topic}. Conviction is high',
    'Every dip on {topic} gets bought. Momentum is real',
  ],
  bearish: [
    '{topic} is wildly overpriced, this ends badly',
    'Feeling {emotion}. Getting out of {topic} before the crash',
    'Sold my {topic} position. {trend} looks like a trap',
    'Nobody is pricing the downside on {topic}. Stay careful',
    'The hype around {topic} is fading fast',
  ],
  neutral: [
    'Watching {topic} closely, no position yet',
    'Mixed signals on {topic} today. {trend} is worth a look',
    'Still undecided about {topic}. Feeling {emotion}',
    'Reading the latest on {trend} before making any move',
  ],
};

export function moodOf(sentiment: number): Mood {
  if (sentiment > 0.2) return 'bullish';
  if (sentiment < -0.2) return 'bearish';
  return 'neutral';
}

export class TemplateContentProducer implements ContentProducer {
  produce(seed: number, sentiment: number, context: ContentContext): string {
    const rng = new Rng(seed);
    const template = rng.pick(TEMPLATES[moodOf(sentiment)]);
    const trend = context.trendTopics.length > 0 ? rng.pick(context.trendTopics) : context.topic;
    return template
      .replaceAll('{topic}', context.topic)
      .replaceAll('{trend}', trend)
      .replaceAll('{emotion}', context.emotion);
  }
}
