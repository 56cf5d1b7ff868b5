import { Column, CreateDateColumn, Entity, PrimaryColumn } from 'typeorm';

@Entity('vectors')
export class VectorRecord {
  @PrimaryColumn('text')
  id!: string;

  @Column('float8', { array: true })
  vector!: number[];

  @CreateDateColumn({ name: 'createdat' })
  createdAt!: Date;
}
