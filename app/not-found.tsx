import Link from "next/link";
import { Coffee } from "lucide-react";
import { buttonVariants } from "@/components/ui/button";

export default function NotFound() {
  return (
    <main className="flex min-h-screen flex-col items-center justify-center bg-background px-4 text-center">
      <Coffee className="mb-6 h-12 w-12 text-primary" />
      <h1 className="mb-2 text-2xl font-semibold text-text-primary">Nothing brewing here</h1>
      <p className="mb-8 text-text-secondary">The page you are looking for does not exist.</p>
      <Link href="/" className={buttonVariants()}>
        Back to the cafés
      </Link>
    </main>
  );
}
