import type { Metadata } from 'next';
import type { ReactNode } from 'react';
import './globals.css';

export const metadata: Metadata = {
  title: 'pingwatch',
  description: 'Network reachability monitor: periodic ICMP probes, latency bands and a traffic-light status for the primary host.'
};

export default function RootLayout({
  children
}: Readonly<{
  children: ReactNode;
}>) {
  return (
    <html lang="en">
      <body>
        <main id="main-app">
          {children}
        </main>
      </body>
    </html>
  );
}
