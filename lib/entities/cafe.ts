import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  OneToMany,
  PrimaryGeneratedColumn,
  Unique,
  UpdateDateColumn,
  type Relation,
} from "typeorm";
import { CafeCategory } from "./cafe-category";

@Entity("cafes")
@Unique("uq_cafe_name_city", ["name", "city"])
export class Cafe {
  @PrimaryGeneratedColumn({ type: "integer" })
  id!: number;

  @Column({ type: "varchar", length: 255 })
  name!: string;

  @Index("idx_cafe_city")
  @Column({ type: "varchar", length: 100 })
  city!: string;

  @Column({ type: "varchar", length: 255, nullable: true })
  address!: string | null;

  @Column({ name: "opening_hours", type: "varchar", length: 100, nullable: true })
  openingHours!: string | null;

  @Column({ type: "text" })
  description!: string;

  @Column({ name: "image_url", type: "varchar", length: 500, nullable: true })
  imageUrl!: string | null;

  @CreateDateColumn({ name: "created_at" })
  createdAt!: Date;

  @UpdateDateColumn({ name: "updated_at" })
  updatedAt!: Date;

  @OneToMany(() => CafeCategory, (link) => link.cafe)
  categoryLinks!: Relation<CafeCategory>[];
}
