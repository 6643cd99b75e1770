import * as React from "react";
import { cn } from "@/lib/utils";

export interface CheckboxProps extends Omit<React.InputHTMLAttributes<HTMLInputElement>, "type"> {
  label: string;
}

/**
 * Native checkbox with its label; clicking the label toggles it
 */
const Checkbox = React.forwardRef<HTMLInputElement, CheckboxProps>(({ className, label, id, ...props }, ref) => {
  const generatedId = React.useId();
  const checkboxId = id ?? generatedId;

  return (
    <div className="flex items-center gap-2">
      <input
        ref={ref}
        id={checkboxId}
        type="checkbox"
        className={cn(
          "h-4 w-4 shrink-0 cursor-pointer rounded border-border bg-background-secondary accent-primary",
          "focus:outline-none focus:ring-2 focus:ring-primary/40",
          "disabled:cursor-not-allowed disabled:opacity-50",
          className
        )}
        {...props}
      />
      <label htmlFor={checkboxId} className="cursor-pointer select-none text-sm text-text-primary">
        {label}
      </label>
    </div>
  );
});
Checkbox.displayName = "Checkbox";

export { Checkbox };
