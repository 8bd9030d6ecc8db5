import { ChatMessage, SummarySection } from '../types/news.types';

export interface SectionHeaders {
  watchPoints: string;
  takeaway: string;
}

export const EN_HEADERS: SectionHeaders = {
  watchPoints: 'Things to Watch Today',
  takeaway: 'Take Away',
};

export const ZH_HEADERS: SectionHeaders = {
  watchPoints: '今天需要注意的事情',
  takeaway: 'Take Away',
};

const SUMMARY_SYSTEM_PROMPT =
  'You are a professional news analyst skilled at extracting key insights from multiple news articles.';

const TRANSLATION_SYSTEM_PROMPT =
  'You are a professional translator for news briefings. Translate faithfully into Traditional Chinese without adding content.';

const EXPANSION_SYSTEM_PROMPT =
  'You turn news search topics into short English search keywords.';

export function buildSummaryMessages(headlines: string[]): ChatMessage[] {
  const newsText = headlines
    .map((title, index) => `${index + 1}. ${title}`)
    .join('\n');

  return [
    { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
    {
      role: 'user',
      content: `Here are today's latest news headlines:

${newsText}

Please summarize based on these headlines:
1. Things to watch today (2-3 key points, concise and clear)
2. A key takeaway (one sentence summarizing the most important insight)

Respond in English using exactly these section headers, copied verbatim:
【${EN_HEADERS.watchPoints}】
1. ...
2. ...
3. ...

【${EN_HEADERS.takeaway}】
...`,
    },
  ];
}

export function buildTranslationMessages(section: SummarySection): ChatMessage[] {
  return [
    { role: 'system', content: TRANSLATION_SYSTEM_PROMPT },
    {
      role: 'user',
      content: `Translate the following news briefing into Traditional Chinese.
Keep the numbered list. Use exactly these section headers, copied verbatim:
【${ZH_HEADERS.watchPoints}】
【${ZH_HEADERS.takeaway}】

【${EN_HEADERS.watchPoints}】
${section.watchPoints}

【${EN_HEADERS.takeaway}】
${section.takeaway}`,
    },
  ];
}

export function buildExpansionMessages(topic: string): ChatMessage[] {
  return [
    { role: 'system', content: EXPANSION_SYSTEM_PROMPT },
    {
      role: 'user',
      content: `Give 1-2 English keywords equivalent to this news topic: ${topic}
Reply with the keywords only, on one line, no quotes and no explanation.`,
    },
  ];
}

export const PROVIDER_CHECK_MESSAGES: ChatMessage[] = [
  { role: 'user', content: "Say 'test'" },
];
