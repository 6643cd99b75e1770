import { Column, Entity, OneToMany, PrimaryGeneratedColumn, type Relation } from "typeorm";
import { CafeCategory } from "./cafe-category";

@Entity("categories")
export class Category {
  @PrimaryGeneratedColumn({ type: "integer" })
  id!: number;

  @Column({ type: "varchar", length: 50, unique: true })
  name!: string;

  @OneToMany(() => CafeCategory, (link) => link.category)
  cafeLinks!: Relation<CafeCategory>[];
}
