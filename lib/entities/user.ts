import { Column, CreateDateColumn, Entity, PrimaryGeneratedColumn } from "typeorm";

@Entity("users")
export class User {
  @PrimaryGeneratedColumn({ type: "integer" })
  id!: number;

  @Column({ type: "varchar", length: 255, unique: true })
  email!: string;

  @Column({ name: "hashed_password", type: "varchar", length: 255 })
  hashedPassword!: string;

  @Column({ name: "is_active", type: "boolean", default: true })
  isActive!: boolean;

  @Column({ name: "is_superuser", type: "boolean", default: false })
  isSuperuser!: boolean;

  @CreateDateColumn({ name: "created_at" })
  createdAt!: Date;
}
