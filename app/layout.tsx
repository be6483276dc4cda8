import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "EconSentinel | National Command",
  description: "Socio-economic threat prediction dashboard",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body className="antialiased">{children}</body>
    </html>
  );
}
