import { Config } from '../config/validation';
import { normalizeTerm, VocabularyWord } from '../core/entities/WordRecord';
import { errorMessage, NoWordsAvailableError, WorkflowBusyError } from '../core/errors';
import { WordStore } from '../core/repositories/WordStore';
import { ComposedEmail, EmailComposer, VocabularyEmailComposer } from '../core/services/EmailComposer';
import { Logger } from '../core/services/Logger';
import { DeliveryReceipt, Mailer } from '../core/services/Mailer';
import { WordSource } from '../core/services/WordSource';
import { startOfDay } from '../core/time';

export type ConfigSource = () => Promise<Config>;
export type MailerFactory = (config: Config, logger: Logger) => Mailer;
export type ComposerFactory = (config: Config) => EmailComposer;

export interface SendDailyWordsOptions {
  composerFactory?: ComposerFactory;
  clock?: () => Date;
}

export interface PreviewResult {
  recipient: string;
  words: VocabularyWord[];
  email: ComposedEmail;
}

export interface SendResult extends PreviewResult {
  receipt: DeliveryReceipt;
  recorded: number;
}

const defaultComposer: ComposerFactory = (config) =>
  new VocabularyEmailComposer(config.bot.name, config.bot.subjectPrefix);

// One instance per process: the scheduler and the web trigger share the busy flag.
export class SendDailyWordsUseCase {
  private isRunning = false;
  private composerFactory: ComposerFactory;
  private clock: () => Date;

  constructor(
    private wordStore: WordStore,
    private wordSource: WordSource,
    private configSource: ConfigSource,
    private mailerFactory: MailerFactory,
    private logger: Logger,
    options: SendDailyWordsOptions = {}
  ) {
    this.composerFactory = options.composerFactory ?? defaultComposer;
    this.clock = options.clock ?? (() => new Date());
  }

  get running(): boolean {
    return this.isRunning;
  }

  async execute(): Promise<SendResult> {
    if (this.isRunning) throw new WorkflowBusyError();
    this.isRunning = true;
    this.logger.time('send-daily-words');

    try {
      const config = await this.configSource();
      const mailer = this.mailerFactory(config, this.logger);
      const now = this.clock();
      const prepared = await this.prepare(config, now);

      const receipt = await mailer.send({ to: prepared.recipient, ...prepared.email });
      const recorded = await this.wordStore.recordSent(prepared.words, now);

      this.logger.info(
        `Sent ${prepared.words.length} word(s) to ${prepared.recipient} via ${receipt.transport}: ${prepared.words
          .map((w) => w.term)
          .join(', ')}`
      );
      return { ...prepared, receipt, recorded };
    } catch (error) {
      this.logger.error(`Daily send failed: ${errorMessage(error)}`);
      throw error;
    } finally {
      this.isRunning = false;
      this.logger.timeEnd('send-daily-words');
    }
  }

  // Selects and composes without sending or recording anything.
  async preview(): Promise<PreviewResult> {
    const config = await this.configSource();
    return this.prepare(config, this.clock());
  }

  private async prepare(config: Config, now: Date): Promise<PreviewResult> {
    const words = await this.selectWords(config.bot.wordsPerDay, config.bot.maxFetchAttempts);
    if (words.length === 0) throw new NoWordsAvailableError();
    if (words.length < config.bot.wordsPerDay) {
      this.logger.warn(`Only ${words.length} of ${config.bot.wordsPerDay} words found; sending what we have`);
    }

    const [totalSent, sentToday] = await Promise.all([
      this.wordStore.countSent(),
      this.wordStore.countSentSince(startOfDay(now)),
    ]);
    const email = this.composerFactory(config).compose(words, {
      date: now,
      stats: { totalSent: totalSent + words.length, sentToday: sentToday + words.length },
    });

    return { recipient: config.recipient.email, words, email };
  }

  private async selectWords(count: number, maxAttempts: number): Promise<VocabularyWord[]> {
    const selected: VocabularyWord[] = [];
    const taken = new Set<string>();
    const isKnown = async (term: string) => {
      const normalized = normalizeTerm(term);
      return taken.has(normalized) || this.wordStore.contains(normalized);
    };

    for (let attempt = 1; attempt <= maxAttempts && selected.length < count; attempt++) {
      const shortfall = count - selected.length;
      const candidates = await this.wordSource.fetch(
        shortfall,
        this.wordSource.supportsFiltering ? { isKnown } : {}
      );
      if (candidates.length === 0) {
        this.logger.debug(`Word source returned nothing on attempt ${attempt}`);
        break;
      }

      // The store has the final say, whatever the source filtered.
      const unsent = new Set(await this.wordStore.findUnsent(candidates.map((c) => c.term)));
      for (const candidate of candidates) {
        if (selected.length >= count) break;
        const term = normalizeTerm(candidate.term);
        if (taken.has(term) || !unsent.has(term)) continue;
        taken.add(term);
        selected.push({ ...candidate, term });
      }
      this.logger.debug(`Attempt ${attempt}: ${selected.length}/${count} words selected`);
    }

    return selected;
  }
}
