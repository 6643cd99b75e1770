"use client";

import { useEffect, useState } from "react";
import { Clock, MapPin, Sparkles } from "lucide-react";
import { Badge } from "@/components/ui/badge";
import {
  Dialog,
  DialogContent,
  DialogDescription,
  DialogHeader,
  DialogTitle,
} from "@/components/ui/dialog";
import { fetchRecommendations } from "@/lib/api-client";
import type { CafeResponse } from "@/types/cafe";

export interface CafeDetailDialogProps {
  cafe: CafeResponse | null;
  onClose: () => void;
  onSelect: (cafe: CafeResponse) => void;
}

/**
 * Details of one cafe plus the most similar other cafes
 */
export function CafeDetailDialog({ cafe, onClose, onSelect }: CafeDetailDialogProps) {
  const [recommendations, setRecommendations] = useState<CafeResponse[]>([]);
  const [loadingRecommendations, setLoadingRecommendations] = useState(false);

  useEffect(() => {
    if (!cafe) return;

    let cancelled = false;
    setRecommendations([]);
    setLoadingRecommendations(true);

    fetchRecommendations(cafe.id)
      .then((result) => {
        if (!cancelled) setRecommendations(result);
      })
      .catch((error: unknown) => {
        console.error("Failed to load recommendations:", error);
      })
      .finally(() => {
        if (!cancelled) setLoadingRecommendations(false);
      });

    return () => {
      cancelled = true;
    };
  }, [cafe]);

  return (
    <Dialog open={cafe !== null} onOpenChange={(open) => !open && onClose()}>
      {cafe && (
        <DialogContent className="max-w-2xl">
          <DialogHeader>
            <DialogTitle>{cafe.name}</DialogTitle>
            <DialogDescription className="flex items-center gap-1">
              <MapPin className="h-3.5 w-3.5" />
              {cafe.address ? `${cafe.address}, ${cafe.city}` : cafe.city}
            </DialogDescription>
          </DialogHeader>

          {cafe.imageUrl && (
            <img
              src={cafe.imageUrl}
              alt={cafe.name}
              className="mb-4 h-56 w-full rounded-md object-cover"
            />
          )}

          <p className="text-sm text-text-secondary whitespace-pre-line">{cafe.description}</p>

          {cafe.openingHours && (
            <p className="mt-3 flex items-center gap-1.5 text-sm text-text-tertiary">
              <Clock className="h-4 w-4" />
              {cafe.openingHours}
            </p>
          )}

          <dl className="mt-4 space-y-2 text-sm">
            <div className="flex items-center gap-2">
              <dt className="text-text-tertiary">Best for</dt>
              <dd>{cafe.bestFor ? <Badge variant="primary">{cafe.bestFor}</Badge> : "-"}</dd>
            </div>
            {cafe.alsoGoodFor.length > 0 && (
              <div className="flex flex-wrap items-center gap-2">
                <dt className="text-text-tertiary">Also good for</dt>
                {cafe.alsoGoodFor.map((name) => (
                  <dd key={name}>
                    <Badge>{name}</Badge>
                  </dd>
                ))}
              </div>
            )}
          </dl>

          <section className="mt-6 border-t border-border pt-4">
            <h3 className="mb-3 flex items-center gap-1.5 text-sm font-semibold text-text-primary">
              <Sparkles className="h-4 w-4 text-primary" />
              You might also like
            </h3>
            {loadingRecommendations ? (
              <p className="text-sm text-text-muted">Loading…</p>
            ) : recommendations.length === 0 ? (
              <p className="text-sm text-text-muted">No similar cafés yet.</p>
            ) : (
              <ul className="space-y-2">
                {recommendations.map((other) => (
                  <li key={other.id}>
                    <button
                      type="button"
                      onClick={() => onSelect(other)}
                      className="w-full rounded-md border border-border px-3 py-2 text-left transition-colors hover:bg-background-hover"
                    >
                      <span className="text-sm font-medium text-text-primary">{other.name}</span>
                      <span className="ml-2 text-xs text-text-tertiary">{other.city}</span>
                    </button>
                  </li>
                ))}
              </ul>
            )}
          </section>
        </DialogContent>
      )}
    </Dialog>
  );
}
