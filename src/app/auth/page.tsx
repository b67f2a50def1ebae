// src/app/auth/page.tsx
'use client';

import { useState } from 'react';
import type { FormEvent } from 'react';
import { useRouter } from 'next/navigation';
import { useTheme } from '../components/useTheme';
import { signIn } from '../generate/writerApi';

export default function AuthPage() {
  const router = useRouter();
  const { theme, toggleTheme } = useTheme();

  const [password, setPassword] = useState('');
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const handleSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    setLoading(true);
    setError(null);
    try {
      await signIn(password);
      router.push('/generate');
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Unexpected error');
    } finally {
      setLoading(false);
    }
  };

  return (
    <div className="relative flex items-center justify-center h-screen p-4 bg-white dark:bg-gray-900 text-black dark:text-white">
      <button
        onClick={toggleTheme}
        className="absolute top-4 right-4 text-sm border border-gray-400 dark:border-gray-600 px-3 py-1 rounded hover:bg-gray-100 dark:hover:bg-gray-700"
      >
        Switch to {theme === 'light' ? 'Dark' : 'Light'} Mode
      </button>

      <form
        onSubmit={handleSubmit}
        className="w-full max-w-xs bg-white dark:bg-gray-800 p-6 rounded-md shadow-md space-y-4"
      >
        <h1 className="text-xl font-bold text-center">Enter the access password</h1>

        <input
          className="w-full p-2 mb-4 border border-gray-300 dark:border-gray-600 bg-white dark:bg-gray-700 text-black dark:text-white rounded"
          type="password"
          placeholder="Password"
          value={password}
          onChange={(e) => setPassword(e.target.value)}
        />

        <button
          type="submit"
          disabled={loading || !password}
          className="w-full bg-blue-500 hover:bg-blue-600 text-white px-4 py-2 rounded disabled:opacity-50"
        >
          {loading ? 'Please wait...' : 'Log In'}
        </button>

        {error && <p className="text-sm text-center text-red-600 dark:text-red-400">{error}</p>}
      </form>
    </div>
  );
}
