import { VocabularyWord } from '../entities/WordRecord';

export interface DeliveryStats {
  totalSent: number;
  sentToday: number;
}

export interface ComposeOptions {
  date?: Date;
  stats?: DeliveryStats;
}

export interface ComposedEmail {
  subject: string;
  text: string;
  html: string;
}

export interface EmailComposer {
  compose(words: VocabularyWord[], options?: ComposeOptions): ComposedEmail;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function titleCase(term: string): string {
  return term
    .split(/(\s+|-)/)
    .map((part) => (part.length > 0 ? part[0].toUpperCase() + part.slice(1).toLowerCase() : part))
    .join('');
}

// "October 05, 2026"
export function formatLongDate(date: Date): string {
  return new Intl.DateTimeFormat('en-US', { month: 'long', day: '2-digit', year: 'numeric' }).format(date);
}

const NO_EXAMPLE = 'No example available';

const STYLES = `
  body { font-family: 'Segoe UI', Tahoma, Verdana, sans-serif; line-height: 1.6; color: #2c3e50; background-color: #f8f9fa; }
  .container { max-width: 600px; margin: 0 auto; background-color: #ffffff; padding: 30px; border-radius: 8px; }
  .header { text-align: center; margin-bottom: 30px; padding-bottom: 20px; border-bottom: 2px solid #3498db; }
  .word-card { border: 1px solid #ecf0f1; border-radius: 8px; padding: 20px; margin-bottom: 20px; }
  .word-title { color: #3498db; font-size: 22px; font-weight: 600; margin-bottom: 12px; }
  .part-of-speech { color: #7f8c8d; font-size: 14px; font-style: italic; }
  .example { background-color: #f8f9fa; padding: 12px; border-left: 4px solid #3498db; font-style: italic; }
  .footer { text-align: center; margin-top: 30px; color: #7f8c8d; font-size: 14px; }
`;

export class VocabularyEmailComposer implements EmailComposer {
  constructor(
    private botName: string,
    private subjectPrefix: string = ''
  ) {}

  compose(words: VocabularyWord[], options: ComposeOptions = {}): ComposedEmail {
    const date = formatLongDate(options.date ?? new Date());
    const prefix = this.subjectPrefix.trim();
    const subject = `${prefix ? `${prefix} ` : ''}Daily Vocabulary - ${date}`;

    return {
      subject,
      text: this.renderText(words, date, options.stats),
      html: this.renderHtml(words, date, options.stats),
    };
  }

  private renderText(words: VocabularyWord[], date: string, stats?: DeliveryStats): string {
    const lines: string[] = ['Hello,', '', `Here are your vocabulary words for ${date}:`, ''];

    words.forEach((word, index) => {
      lines.push(`${index + 1}. ${titleCase(word.term)}`);
      lines.push(`   Definition: ${word.definition}`);
      if (word.partOfSpeech) lines.push(`   Part of Speech: ${word.partOfSpeech}`);
      lines.push(`   Example: ${word.example ?? NO_EXAMPLE}`);
      lines.push('');
    });

    if (stats) {
      lines.push('Vocabulary Statistics:');
      lines.push(`Total words sent so far: ${stats.totalSent}`);
      lines.push(`Words sent today: ${stats.sentToday}`);
      lines.push('');
    }

    lines.push('Best regards,');
    lines.push(this.botName);
    return lines.join('\n');
  }

  private renderHtml(words: VocabularyWord[], date: string, stats?: DeliveryStats): string {
    const cards = words
      .map((word, index) => {
        const pos = word.partOfSpeech
          ? `<div class="part-of-speech"><strong>Part of Speech:</strong> ${escapeHtml(word.partOfSpeech)}</div>`
          : '';
        return [
          '<div class="word-card">',
          `<div class="word-title">${index + 1}. ${escapeHtml(titleCase(word.term))}</div>`,
          `<div class="definition"><strong>Definition:</strong> ${escapeHtml(word.definition)}</div>`,
          pos,
          `<div class="example"><strong>Example:</strong> ${escapeHtml(word.example ?? NO_EXAMPLE)}</div>`,
          '</div>',
        ]
          .filter(Boolean)
          .join('\n');
      })
      .join('\n');

    const statsBlock = stats
      ? [
          '<hr>',
          '<h3>Vocabulary Statistics</h3>',
          `<p><strong>Total words sent so far:</strong> ${stats.totalSent}</p>`,
          `<p><strong>Words sent today:</strong> ${stats.sentToday}</p>`,
        ].join('\n')
      : '';

    return [
      '<!DOCTYPE html>',
      '<html>',
      `<head><meta charset="utf-8"><style>${STYLES}</style></head>`,
      '<body>',
      '<div class="container">',
      `<div class="header"><h1>Daily Vocabulary</h1><p>Your vocabulary words for ${escapeHtml(date)}</p></div>`,
      cards,
      statsBlock,
      `<div class="footer"><p>Best regards,<br>${escapeHtml(this.botName)}</p></div>`,
      '</div>',
      '</body>',
      '</html>',
    ]
      .filter(Boolean)
      .join('\n');
  }
}
