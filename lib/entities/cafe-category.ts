import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn, Unique, type Relation } from "typeorm";
import { Cafe } from "./cafe";
import { Category } from "./category";

/**
 * Link between a cafe and one of its categories. The single link with
 * `isBest` set is the cafe's primary ("Best For") category.
 */
@Entity("cafe_categories")
@Unique("uq_cafe_category", ["cafeId", "categoryId"])
export class CafeCategory {
  @PrimaryGeneratedColumn({ type: "integer" })
  id!: number;

  @Index("idx_cafe_category_cafe_id")
  @Column({ name: "cafe_id", type: "integer" })
  cafeId!: number;

  @Index("idx_cafe_category_category_id")
  @Column({ name: "category_id", type: "integer" })
  categoryId!: number;

  @Column({ name: "is_best", type: "boolean", default: false })
  isBest!: boolean;

  @ManyToOne(() => Cafe, (cafe) => cafe.categoryLinks, { onDelete: "CASCADE" })
  @JoinColumn({ name: "cafe_id" })
  cafe!: Relation<Cafe>;

  @ManyToOne(() => Category, (category) => category.cafeLinks, { onDelete: "CASCADE" })
  @JoinColumn({ name: "category_id" })
  category!: Relation<Category>;
}
