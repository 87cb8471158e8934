import type { Metadata } from 'next';
import type { ReactNode } from 'react';
import Link from 'next/link';
import './globals.css';

export const metadata: Metadata = {
  title: 'Crime Sentinel',
  description: 'Ten years of municipal crime-incident records: temporal trends, hotspots and arrest-rate correlations.',
};

export default function RootLayout({
  children,
}: Readonly<{
  children: ReactNode;
}>) {
  return (
    <html lang="en">
      <body>
        <div className="site-frame">
          <a href="#main-content" className="skip-link">
            Skip to content
          </a>
          <header className="site-header">
            <div className="site-header-inner">
              <Link href="/" className="site-brand" aria-label="Crime Sentinel Home">
                <span className="site-brand-mark" aria-hidden="true" />
                <span className="site-brand-copy">
                  <span className="site-brand-title">Crime Sentinel</span>
                  <span className="site-brand-subtitle">Public Safety Analysis Dashboard</span>
                </span>
              </Link>
            </div>
          </header>
          {children}
        </div>
      </body>
    </html>
  );
}
