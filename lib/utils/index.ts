import { clsx, type ClassValue } from "clsx";
import { twMerge } from "tailwind-merge";

/**
 * Merge Tailwind class names, letting later utilities win over earlier ones
 */
export function cn(...inputs: ClassValue[]): string {
  return twMerge(clsx(inputs));
}
