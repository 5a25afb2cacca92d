import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, OneToMany, Index } from 'typeorm';
import { Hall } from './hall.entity';

@Entity('theaters')
@Index('IDX_theater_city', ['city'])
@Index('IDX_theater_name', ['name'])
export class Theater {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 150 })
  name!: string;

  @Column({ type: 'varchar', length: 255 })
  location!: string;

  @Column({ type: 'varchar', length: 100 })
  city!: string;

  @Column({ type: 'varchar', length: 100 })
  state!: string;

  @Column({ type: 'varchar', length: 20 })
  postalCode!: string;

  @Column({ type: 'varchar', length: 30, nullable: true })
  contactNumber!: string | null;

  @Column({ default: true })
  isActive!: boolean;

  @OneToMany(() => Hall, (hall) => hall.theater)
  halls!: Hall[];

  @CreateDateColumn()
  createdAt!: Date;
}
