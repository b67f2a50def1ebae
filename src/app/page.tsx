'use client';
import { useEffect } from 'react';
import { useRouter } from 'next/navigation';

export default function Home() {
  const router = useRouter();

  useEffect(() => {
    fetch('/api/session')
      .then((response) => router.push(response.ok ? '/generate' : '/auth'))
      .catch(() => router.push('/auth'));
  }, [router]);

  return (
    <main className="min-h-screen flex items-center justify-center">
      <p>Redirecting...</p>
    </main>
  );
}
