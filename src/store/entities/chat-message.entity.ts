import {
  Column,
  CreateDateColumn,
  Entity,
  PrimaryGeneratedColumn,
} from 'typeorm';

@Entity('chat_history')
export class ChatMessage {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'text' })
  user_message!: string;

  // Null until the chat webhook call settles, then written exactly once
  @Column({ type: 'text', nullable: true })
  bot_response!: string | null;

  @CreateDateColumn()
  timestamp!: Date;
}
