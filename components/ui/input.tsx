import * as React from "react";
import { cn } from "@/lib/utils";

/**
 * Border, focus ring and disabled styles shared by text inputs, text areas
 * and selects
 */
export const fieldClassName = cn(
  "w-full rounded-md border border-border bg-background-secondary px-3 text-sm text-text-primary transition-colors",
  "placeholder:text-text-muted hover:border-border-hover",
  "focus:border-primary focus:outline-none focus:ring-2 focus:ring-primary/40",
  "disabled:cursor-not-allowed disabled:opacity-50"
);

export type InputProps = React.InputHTMLAttributes<HTMLInputElement>;

const Input = React.forwardRef<HTMLInputElement, InputProps>(({ className, ...props }, ref) => (
  <input
    ref={ref}
    className={cn(fieldClassName, "flex h-9 py-2", className)}
    {...props}
  />
));
Input.displayName = "Input";

export type TextareaProps = React.TextareaHTMLAttributes<HTMLTextAreaElement>;

const Textarea = React.forwardRef<HTMLTextAreaElement, TextareaProps>(
  ({ className, ...props }, ref) => (
    <textarea
      ref={ref}
      className={cn(fieldClassName, "flex min-h-[80px] resize-y py-2", className)}
      {...props}
    />
  )
);
Textarea.displayName = "Textarea";

export { Input, Textarea };
