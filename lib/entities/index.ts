import "reflect-metadata";

export { Cafe } from "./cafe";
export { CafeCategory } from "./cafe-category";
export { Category } from "./category";
export { User } from "./user";
