import { Inject, Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Turn } from '../../entities';
import { CLOCK, Clock } from '../../utils/clock';
import { ConversationStore, HistoryPage, TurnRecord } from './types';

@Injectable()
export class ConversationLogService implements ConversationStore {

  // Appends and history pages run one at a time: id order and timestamp
  // order agree, and a page's total matches its turns.
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    @InjectRepository(Turn)
    private readonly turnRepository: Repository<Turn>,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) { }

  append(userText: string, aiText: string): Promise<TurnRecord> {
    return this.serialize(() => this.insert(userText, aiText));
  }

  history(limit: number): Promise<HistoryPage> {
    return this.serialize(async () => {
      const turns = await this.fetchRecent(limit);
      const total = await this.count();
      return { turns, total };
    });
  }

  async fetchRecent(limit: number): Promise<TurnRecord[]> {
    if (!Number.isInteger(limit) || limit <= 0) return [];
    const newestFirst = await this.turnRepository.find({
      order: { id: 'DESC' },
      take: limit,
    });
    return newestFirst.reverse();
  }

  count(): Promise<number> {
    return this.turnRepository.count();
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const next = this.tail.then(task);
    // the caller receives the rejection; the chain only needs to keep moving
    this.tail = next.catch(() => undefined);
    return next;
  }

  private insert(userText: string, aiText: string): Promise<TurnRecord> {
    const turn = this.turnRepository.create({
      timestamp: this.clock().toISOString(),
      userText,
      aiText,
    });
    return this.turnRepository.save(turn);
  }
}
