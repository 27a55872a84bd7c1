import { Entity, PrimaryGeneratedColumn, Column } from 'typeorm';
import { TurnRecord } from '../logic/conversation-log/types';

// Append-only: rows are inserted by the conversation log and never updated.
@Entity('messages')
export class Turn implements TurnRecord {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column('text')
  timestamp!: string;

  @Column('text', { name: 'user_msg' })
  userText!: string;

  @Column('text', { name: 'ai_msg' })
  aiText!: string;
}
