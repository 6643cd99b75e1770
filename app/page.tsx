import { CafeBrowser } from "@/components/cafes/CafeBrowser";

export default function HomePage() {
  return (
    <div className="min-h-screen bg-background">
      <CafeBrowser />
    </div>
  );
}
