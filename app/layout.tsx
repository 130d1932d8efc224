import type { Metadata, Viewport } from "next";
import type { ReactNode } from "react";

export const metadata: Metadata = {
  title: "Verse of the Day",
  description: "One King James verse a day, never repeated until the whole corpus has been read",
};

export const viewport: Viewport = {
  width: "device-width",
  initialScale: 1,
  themeColor: "#151411",
};

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en">
      <body
        style={{
          margin: 0,
          minHeight: "100vh",
          background: "#151411",
          color: "#f1ebe0",
          fontFamily: "Georgia, 'Times New Roman', serif",
        }}
      >
        {children}
      </body>
    </html>
  );
}
