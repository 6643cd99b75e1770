"use client";

import { useState } from "react";
import { Button } from "@/components/ui/button";
import {
  Dialog,
  DialogContent,
  DialogDescription,
  DialogFooter,
  DialogHeader,
  DialogTitle,
} from "@/components/ui/dialog";
import type { CafeResponse } from "@/types/cafe";

export interface DeleteCafeDialogProps {
  cafe: CafeResponse | null;
  onCancel: () => void;
  onConfirm: (cafe: CafeResponse) => Promise<void>;
}

export function DeleteCafeDialog({ cafe, onCancel, onConfirm }: DeleteCafeDialogProps) {
  const [deleting, setDeleting] = useState(false);

  const handleConfirm = async () => {
    if (!cafe) return;
    setDeleting(true);
    try {
      await onConfirm(cafe);
    } finally {
      setDeleting(false);
    }
  };

  return (
    <Dialog open={cafe !== null} onOpenChange={(open) => !open && onCancel()}>
      <DialogContent>
        <DialogHeader>
          <DialogTitle>Delete café</DialogTitle>
          <DialogDescription>
            {cafe ? `"${cafe.name}" in ${cafe.city} will be removed permanently.` : null}
          </DialogDescription>
        </DialogHeader>
        <DialogFooter>
          <Button variant="ghost" onClick={onCancel}>
            Cancel
          </Button>
          <Button variant="danger" loading={deleting} onClick={handleConfirm}>
            Delete
          </Button>
        </DialogFooter>
      </DialogContent>
    </Dialog>
  );
}
