export * from './turn.entity';
