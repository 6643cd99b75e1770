import type { Metadata } from "next";
import { Toaster } from "sonner";
import "./globals.css";

export const metadata: Metadata = {
  title: "Cafés",
  description: "Find a café for breakfast, remote work, a quiet read or a date.",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body className="antialiased">
        {children}
        <Toaster
          theme="dark"
          position="top-right"
          toastOptions={{
            style: {
              background: "#171411",
              border: "1px solid #2e2722",
              color: "#faf7f2",
            },
          }}
        />
      </body>
    </html>
  );
}
