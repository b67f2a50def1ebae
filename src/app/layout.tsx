import type { ReactNode } from 'react';
import './globals.css';

export const metadata = {
  title: {
    default: 'Article Writer',
    template: '%s | Article Writer',
  },
  description: 'Long-form article drafting with length checks, tracked revisions and Word export',
};

export default function RootLayout({
  children,
}: {
  children: ReactNode;
}) {
  return (
    <html lang="en">
      <body>{children}</body>
    </html>
  );
}
