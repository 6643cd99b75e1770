import { Clock, MapPin } from "lucide-react";
import { Badge } from "@/components/ui/badge";
import { cn } from "@/lib/utils";
import type { CafeResponse } from "@/types/cafe";

export interface CafeCardProps {
  cafe: CafeResponse;
  onSelect?: (cafe: CafeResponse) => void;
  className?: string;
}

export function CafeCard({ cafe, onSelect, className }: CafeCardProps) {
  return (
    <button
      type="button"
      onClick={() => onSelect?.(cafe)}
      className={cn(
        "group flex flex-col overflow-hidden rounded-lg border border-border bg-background-secondary text-left transition-colors",
        "hover:border-border-hover hover:bg-background-tertiary",
        "focus:outline-none focus-visible:ring-2 focus-visible:ring-primary/60",
        className
      )}
    >
      {cafe.imageUrl ? (
        <img src={cafe.imageUrl} alt={cafe.name} className="h-40 w-full object-cover" />
      ) : (
        <div className="h-40 w-full bg-background-tertiary" />
      )}

      <div className="flex flex-1 flex-col gap-3 p-4">
        <div>
          <h3 className="font-semibold text-text-primary group-hover:text-primary transition-colors">
            {cafe.name}
          </h3>
          <p className="mt-1 flex items-center gap-1 text-xs text-text-tertiary">
            <MapPin className="h-3 w-3" />
            {cafe.city}
          </p>
        </div>

        <p className="line-clamp-2 text-sm text-text-secondary">{cafe.description}</p>

        {cafe.openingHours && (
          <p className="flex items-center gap-1 text-xs text-text-tertiary">
            <Clock className="h-3 w-3" />
            {cafe.openingHours}
          </p>
        )}

        <div className="mt-auto flex flex-wrap gap-1.5">
          {cafe.bestFor && <Badge variant="primary">{cafe.bestFor}</Badge>}
          {cafe.alsoGoodFor.map((name) => (
            <Badge key={name}>{name}</Badge>
          ))}
        </div>
      </div>
    </button>
  );
}
