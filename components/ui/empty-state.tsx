import * as React from "react";
import type { LucideIcon } from "lucide-react";
import { cn } from "@/lib/utils";

export interface EmptyStateProps extends React.HTMLAttributes<HTMLDivElement> {
  icon?: LucideIcon;
  title: string;
  description?: string;
  action?: React.ReactNode;
}

function EmptyState({ className, icon: Icon, title, description, action, ...props }: EmptyStateProps) {
  return (
    <div
      className={cn("flex flex-col items-center justify-center px-4 py-12 text-center", className)}
      {...props}
    >
      {Icon && (
        <div className="mb-4 rounded-full bg-background-tertiary p-3">
          <Icon className="h-6 w-6 text-text-muted" />
        </div>
      )}
      <h3 className="mb-1 text-lg font-semibold text-text-primary">{title}</h3>
      {description && <p className="mb-4 max-w-sm text-sm text-text-secondary">{description}</p>}
      {action}
    </div>
  );
}

export { EmptyState };
