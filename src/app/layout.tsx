import type { Metadata, Viewport } from "next";
import { PageShell } from "@/components/layout/page-shell";
import "./globals.css";

export const metadata: Metadata = {
  title: "Card Deck",
  description: "A swipeable stack of colored cards",
};

export const viewport: Viewport = {
  width: "device-width",
  initialScale: 1,
};

export default function RootLayout({ children }: Readonly<{ children: React.ReactNode }>) {
  return (
    <html lang="en">
      <body>
        <PageShell>{children}</PageShell>
      </body>
    </html>
  );
}
