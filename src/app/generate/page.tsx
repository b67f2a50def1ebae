// page.tsx
'use client';

import { useEffect, useState } from 'react';
import type { ChangeEvent } from 'react';
import { useRouter } from 'next/navigation';
import clsx from 'clsx';
import { DEFAULT_BAND_TEXT, LANGUAGE_VARIANTS } from '../../constants/lengthOptions';
import type { LanguageVariant } from '../../types/article';
import type { ArticleView, SessionView } from '../../lib/sessionView';
import { useTheme } from '../components/useTheme';
import {
  WriterApiError,
  clearLogo,
  expandArticle,
  exportUrl,
  fetchSession,
  generateArticles,
  loadHistoryEntry,
  reviseArticle,
  signOut,
  suggestTitle,
  uploadLogo,
} from './writerApi';

const ACCEPTED_DOCUMENTS = '.pdf,.docx,.txt,.csv,.xlsx';

function describeError(err: unknown, fallback: string): string {
  return err instanceof Error ? err.message : fallback;
}

export default function GeneratePage() {
  const router = useRouter();
  const { theme, toggleTheme } = useTheme();

  const [session, setSession] = useState<SessionView | null>(null);

  const [topic, setTopic] = useState('');
  const [facts, setFacts] = useState('');
  const [quotes, setQuotes] = useState('');
  const [keywords, setKeywords] = useState('');
  const [bandText, setBandText] = useState(DEFAULT_BAND_TEXT);
  const [variants, setVariants] = useState<Record<LanguageVariant, boolean>>({ UK: true, US: false });
  const [includeImpactSection, setIncludeImpactSection] = useState(false);
  const [aiFriendlyFormat, setAiFriendlyFormat] = useState(false);
  const [documentFile, setDocumentFile] = useState<File | null>(null);

  const [loading, setLoading] = useState(false);
  const [titleLoading, setTitleLoading] = useState(false);
  const [generateError, setGenerateError] = useState<string | null>(null);
  const [notices, setNotices] = useState<string[]>([]);
  const [warnings, setWarnings] = useState<string[]>([]);

  const [activeVariant, setActiveVariant] = useState<LanguageVariant>('UK');
  const [changeRequest, setChangeRequest] = useState('');
  const [revising, setRevising] = useState(false);
  const [expanding, setExpanding] = useState(false);
  const [revisionError, setRevisionError] = useState<string | null>(null);

  useEffect(() => {
    fetchSession()
      .then(({ session: view }) => setSession(view))
      .catch((err: unknown) => {
        if (err instanceof WriterApiError && err.status === 401) {
          router.push('/auth');
          return;
        }
        console.error('[generate] failed to load session', err);
      });
  }, [router]);

  const handleAuthError = (err: unknown): boolean => {
    if (err instanceof WriterApiError && err.status === 401) {
      router.push('/auth');
      return true;
    }
    return false;
  };

  const replaceArticle = (article: ArticleView) => {
    setSession((prev) => {
      if (!prev?.current) return prev;
      return {
        ...prev,
        current: {
          ...prev.current,
          articles: prev.current.articles.map((existing) =>
            existing.variant === article.variant ? article : existing
          ),
        },
      };
    });
  };

  const handleSuggestTitle = async () => {
    if (!topic.trim()) {
      setGenerateError('Enter a topic first.');
      return;
    }
    setTitleLoading(true);
    setGenerateError(null);
    try {
      const result = await suggestTitle(topic, keywords);
      setTopic(result.title);
      setNotices(result.notices);
    } catch (err) {
      if (!handleAuthError(err)) setGenerateError(describeError(err, 'Could not suggest a title.'));
    } finally {
      setTitleLoading(false);
    }
  };

  const handleGenerate = async () => {
    const selected = LANGUAGE_VARIANTS.filter((variant) => variants[variant]);
    if (!topic.trim()) {
      setGenerateError('Topic is required.');
      return;
    }
    if (selected.length === 0) {
      setGenerateError('Select at least one language variant.');
      return;
    }

    const form = new FormData();
    form.append('topic', topic);
    form.append('facts', facts);
    form.append('quotes', quotes);
    form.append('keywords', keywords);
    form.append('wordCount', bandText);
    selected.forEach((variant) => form.append('variants', variant));
    form.append('includeImpactSection', String(includeImpactSection));
    form.append('aiFriendlyFormat', String(aiFriendlyFormat));
    if (documentFile) {
      form.append('document', documentFile);
    }

    setLoading(true);
    setGenerateError(null);
    setNotices([]);
    setWarnings([]);
    try {
      const result = await generateArticles(form);
      setSession(result.session);
      setNotices(result.notices);
      setWarnings([
        ...result.warnings,
        ...result.failures.map(({ variant, message }) => `${variant} article failed: ${message}`),
      ]);
      setActiveVariant(result.session.current?.articles[0]?.variant ?? 'UK');
    } catch (err) {
      if (!handleAuthError(err)) setGenerateError(describeError(err, 'Generation failed.'));
    } finally {
      setLoading(false);
    }
  };

  const handleRevise = async () => {
    if (!changeRequest.trim()) {
      setRevisionError('Describe the change you want.');
      return;
    }
    setRevising(true);
    setRevisionError(null);
    try {
      const result = await reviseArticle(activeVariant, changeRequest);
      replaceArticle(result.article);
      setNotices(result.notices);
      setChangeRequest('');
    } catch (err) {
      if (!handleAuthError(err)) setRevisionError(describeError(err, 'Revision failed.'));
    } finally {
      setRevising(false);
    }
  };

  const handleExpand = async () => {
    setExpanding(true);
    setRevisionError(null);
    try {
      const result = await expandArticle(activeVariant);
      replaceArticle(result.article);
      setNotices(result.notices);
    } catch (err) {
      if (!handleAuthError(err)) setRevisionError(describeError(err, 'Expansion failed.'));
    } finally {
      setExpanding(false);
    }
  };

  const handleLoadHistory = async (sequenceId: number) => {
    try {
      const result = await loadHistoryEntry(sequenceId);
      setSession(result.session);
      setActiveVariant(result.session.current?.articles[0]?.variant ?? 'UK');
    } catch (err) {
      if (!handleAuthError(err)) setGenerateError(describeError(err, 'Could not load history entry.'));
    }
  };

  const handleLogoChange = async (event: ChangeEvent<HTMLInputElement>) => {
    const file = event.target.files?.[0];
    if (!file) return;
    try {
      await uploadLogo(file);
      setSession((prev) => (prev ? { ...prev, hasLogo: true } : prev));
    } catch (err) {
      if (!handleAuthError(err)) setGenerateError(describeError(err, 'Could not upload logo.'));
    }
  };

  const handleClearLogo = async () => {
    try {
      await clearLogo();
      setSession((prev) => (prev ? { ...prev, hasLogo: false } : prev));
    } catch (err) {
      if (!handleAuthError(err)) setGenerateError(describeError(err, 'Could not remove logo.'));
    }
  };

  const handleSignOut = async () => {
    try {
      await signOut();
    } catch (err) {
      console.warn('[generate] sign out failed', err);
    }
    router.push('/auth');
  };

  const current = session?.current ?? null;
  const activeArticle = current?.articles.find((article) => article.variant === activeVariant) ?? null;

  const labelStyle = 'block text-sm font-medium text-gray-700 dark:text-gray-300 mb-1';
  const inputStyle =
    'border border-gray-300 dark:border-gray-600 bg-white dark:bg-gray-800 text-sm text-black dark:text-white rounded-md px-3 py-2 w-full focus:outline-none focus:ring-2 focus:ring-blue-500';
  return (
    <div
      className={clsx(
        'min-h-screen transition-colors',
        theme === 'dark' ? 'bg-gray-900 text-white' : 'bg-gray-50 text-black'
      )}
    >
      {/* TOP BAR */}
      <div className="w-full px-6 py-4 flex justify-between items-center bg-white dark:bg-gray-800 border-b border-gray-200 dark:border-gray-700">
        <h1 className="text-xl font-semibold">Generate New Article</h1>
        <div className="flex space-x-2">
          <button
            onClick={toggleTheme}
            className="text-sm border border-gray-400 dark:border-gray-600 px-3 py-1 rounded hover:bg-gray-100 dark:hover:bg-gray-700"
          >
            Switch to {theme === 'light' ? 'Dark' : 'Light'} Mode
          </button>
          <button onClick={handleSignOut} className="bg-red-500 text-white px-4 py-2 rounded">
            Sign Out
          </button>
        </div>
      </div>

      <div className="max-w-5xl mx-auto px-6 py-10 grid gap-6 lg:grid-cols-[2fr_1fr]">
        <div className="space-y-6">
          <div className="space-y-6 bg-white dark:bg-gray-800 shadow-md rounded-lg p-6">
            {/* TOPIC */}
            <div>
              <label className={labelStyle} htmlFor="generate-topic">
                Topic / Title
              </label>
              <div className="flex gap-2">
                <input
                  id="generate-topic"
                  className={inputStyle}
                  value={topic}
                  onChange={(e) => setTopic(e.target.value)}
                  placeholder="e.g. How skills-based hiring is changing graduate recruitment"
                />
                <button
                  type="button"
                  onClick={handleSuggestTitle}
                  disabled={titleLoading}
                  className="shrink-0 rounded-md border border-gray-300 dark:border-gray-600 px-3 py-2 text-sm hover:bg-gray-100 dark:hover:bg-gray-700 disabled:opacity-50"
                >
                  {titleLoading ? 'Thinking…' : 'Suggest title'}
                </button>
              </div>
            </div>

            {/* FACTS & QUOTES */}
            <div>
              <label className={labelStyle} htmlFor="generate-facts">
                Facts to include
              </label>
              <textarea
                id="generate-facts"
                rows={3}
                className={clsx(inputStyle, 'mb-2')}
                value={facts}
                onChange={(e) => setFacts(e.target.value)}
              />
            </div>
            <div>
              <label className={labelStyle} htmlFor="generate-quotes">
                Quotes to include
              </label>
              <textarea
                id="generate-quotes"
                rows={3}
                className={clsx(inputStyle, 'mb-2')}
                value={quotes}
                onChange={(e) => setQuotes(e.target.value)}
              />
            </div>

            {/* KEYWORDS & LENGTH */}
            <div className="grid gap-4 sm:grid-cols-2">
              <div>
                <label className={labelStyle} htmlFor="generate-keywords">
                  Extra keywords (comma separated)
                </label>
                <input
                  id="generate-keywords"
                  className={inputStyle}
                  value={keywords}
                  onChange={(e) => setKeywords(e.target.value)}
                />
              </div>
              <div>
                <label className={labelStyle} htmlFor="generate-band">
                  Word count range
                </label>
                <input
                  id="generate-band"
                  className={inputStyle}
                  value={bandText}
                  onChange={(e) => setBandText(e.target.value)}
                  placeholder={DEFAULT_BAND_TEXT}
                />
              </div>
            </div>

            {/* SUPPORTING DOCUMENT */}
            <div>
              <label className={labelStyle} htmlFor="generate-document">
                Supporting document (PDF, Word, text, CSV or Excel)
              </label>
              <input
                id="generate-document"
                type="file"
                accept={ACCEPTED_DOCUMENTS}
                onChange={(e) => setDocumentFile(e.target.files?.[0] ?? null)}
                className="text-sm"
              />
            </div>

            {/* OPTIONS */}
            <div className="flex flex-wrap gap-6">
              {LANGUAGE_VARIANTS.map((variant) => (
                <div key={variant} className="flex items-center">
                  <input
                    id={`variant-${variant}`}
                    type="checkbox"
                    checked={variants[variant]}
                    onChange={(e) => setVariants((prev) => ({ ...prev, [variant]: e.target.checked }))}
                    className="mr-2 h-4 w-4"
                  />
                  <label htmlFor={`variant-${variant}`} className="text-sm font-medium text-gray-700 dark:text-gray-300">
                    {variant} English
                  </label>
                </div>
              ))}
              <div className="flex items-center">
                <input
                  id="include-impact"
                  type="checkbox"
                  checked={includeImpactSection}
                  onChange={(e) => setIncludeImpactSection(e.target.checked)}
                  className="mr-2 h-4 w-4"
                />
                <label htmlFor="include-impact" className="text-sm font-medium text-gray-700 dark:text-gray-300">
                  Include hiring impact section
                </label>
              </div>
              <div className="flex items-center">
                <input
                  id="ai-friendly"
                  type="checkbox"
                  checked={aiFriendlyFormat}
                  onChange={(e) => setAiFriendlyFormat(e.target.checked)}
                  className="mr-2 h-4 w-4"
                />
                <label htmlFor="ai-friendly" className="text-sm font-medium text-gray-700 dark:text-gray-300">
                  AI-friendly format (Q&amp;A headings, FAQ, TL;DR)
                </label>
              </div>
            </div>

            {/* GENERATE BUTTON */}
            <div className="pt-4">
              <button
                onClick={handleGenerate}
                disabled={loading}
                className="w-full bg-blue-600 hover:bg-blue-700 text-white font-medium py-2 px-4 rounded shadow disabled:opacity-50"
              >
                {loading ? 'Generating…' : 'Generate Articles'}
              </button>
              {generateError && (
                <p className="mt-2 text-sm text-red-600 dark:text-red-400">{generateError}</p>
              )}
            </div>
          </div>

          {(notices.length > 0 || warnings.length > 0) && (
            <div className="space-y-2 text-sm">
              {warnings.map((warning, index) => (
                <p key={`warning-${index}`} className="rounded-md bg-yellow-50 dark:bg-yellow-900/30 px-3 py-2 text-yellow-800 dark:text-yellow-200">
                  {warning}
                </p>
              ))}
              {notices.map((notice, index) => (
                <p key={`notice-${index}`} className="rounded-md bg-blue-50 dark:bg-blue-900/30 px-3 py-2 text-blue-800 dark:text-blue-200">
                  {notice}
                </p>
              ))}
            </div>
          )}

          {/* ARTICLES */}
          {current && (
            <div className="space-y-4 bg-white dark:bg-gray-800 shadow-md rounded-lg p-6">
              <div className="flex flex-col gap-1">
                <h2 className="text-lg font-semibold">{current.title}</h2>
                <p className="text-sm text-gray-600 dark:text-gray-300">Keywords: {current.keywords.join(', ')}</p>
              </div>

              {current.documentAnalysis && (
                <details className="text-sm">
                  <summary className="cursor-pointer font-medium">Document analysis</summary>
                  <pre className="mt-2 whitespace-pre-wrap text-xs text-gray-700 dark:text-gray-300">
                    {current.documentAnalysis}
                  </pre>
                </details>
              )}

              <div className="flex space-x-2">
                {current.articles.map((article) => (
                  <button
                    key={article.variant}
                    onClick={() => setActiveVariant(article.variant)}
                    className={clsx(
                      'px-4 py-2 rounded-md text-sm font-medium transition-colors',
                      activeVariant === article.variant
                        ? 'bg-blue-600 text-white shadow'
                        : 'bg-gray-100 text-gray-700 hover:bg-gray-200 dark:bg-gray-700 dark:text-gray-300 dark:hover:bg-gray-600'
                    )}
                  >
                    {article.variant} English ({article.wordCount} words)
                  </button>
                ))}
              </div>

              {activeArticle && (
                <>
                  <p
                    className={clsx(
                      'text-sm',
                      activeArticle.wordCount >= current.band.min
                        ? 'text-green-700 dark:text-green-400'
                        : 'text-orange-700 dark:text-orange-400'
                    )}
                  >
                    {activeArticle.wordCount} words (target {current.band.min}-{current.band.max})
                  </p>
                  <div
                    className="article-preview text-sm"
                    dangerouslySetInnerHTML={{ __html: activeArticle.previewHtml }}
                  />

                  <div className="flex flex-wrap gap-2">
                    <a
                      href={exportUrl(activeArticle.variant)}
                      className="bg-green-600 hover:bg-green-700 text-white text-sm px-4 py-2 rounded"
                    >
                      Download {activeArticle.variant} .docx
                    </a>
                    <button
                      onClick={handleExpand}
                      disabled={expanding}
                      className="text-sm border border-gray-400 dark:border-gray-600 px-4 py-2 rounded hover:bg-gray-100 dark:hover:bg-gray-700 disabled:opacity-50"
                    >
                      {expanding ? 'Expanding…' : 'Top up to minimum length'}
                    </button>
                  </div>

                  {/* REVISION */}
                  <div>
                    <label className={labelStyle} htmlFor="revision-request">
                      Request changes
                    </label>
                    <textarea
                      id="revision-request"
                      rows={3}
                      className={clsx(inputStyle, 'mb-2')}
                      value={changeRequest}
                      onChange={(e) => setChangeRequest(e.target.value)}
                      placeholder="e.g. Add a paragraph on apprenticeships to the second section"
                    />
                    <button
                      onClick={handleRevise}
                      disabled={revising}
                      className="bg-blue-600 hover:bg-blue-700 text-white text-sm px-4 py-2 rounded disabled:opacity-50"
                    >
                      {revising ? 'Revising…' : 'Revise article'}
                    </button>
                    {revisionError && (
                      <p className="mt-2 text-sm text-red-600 dark:text-red-400">{revisionError}</p>
                    )}
                  </div>
                </>
              )}
            </div>
          )}
        </div>

        {/* SIDEBAR */}
        <div className="space-y-6">
          <div className="bg-white dark:bg-gray-800 shadow-md rounded-lg p-6 space-y-2 text-sm">
            <h2 className="text-base font-semibold">Session statistics</h2>
            <p>Articles generated: {session?.stats.totalArticles ?? 0}</p>
            <p>Total words: {session?.stats.totalWords ?? 0}</p>
            <p>Files processed: {session?.stats.filesProcessed ?? 0}</p>
          </div>

          <div className="bg-white dark:bg-gray-800 shadow-md rounded-lg p-6 space-y-2 text-sm">
            <h2 className="text-base font-semibold">Document logo</h2>
            <input type="file" accept="image/png,image/jpeg" onChange={handleLogoChange} />
            {session?.hasLogo && (
              <button onClick={handleClearLogo} className="text-red-600 dark:text-red-400 underline">
                Remove logo
              </button>
            )}
          </div>

          <div className="bg-white dark:bg-gray-800 shadow-md rounded-lg p-6 space-y-2 text-sm">
            <h2 className="text-base font-semibold">History</h2>
            {session && session.history.length > 0 ? (
              <ul className="space-y-2">
                {session.history.map((entry) => (
                  <li key={entry.sequenceId}>
                    <button
                      onClick={() => handleLoadHistory(entry.sequenceId)}
                      className="w-full text-left rounded-md px-2 py-1 hover:bg-gray-100 dark:hover:bg-gray-700"
                    >
                      <span className="block font-medium">{entry.title}</span>
                      <span className="block text-xs text-gray-500 dark:text-gray-400">
                        {new Date(entry.timestamp).toLocaleString()} · {entry.variants.join(', ')}
                      </span>
                    </button>
                  </li>
                ))}
              </ul>
            ) : (
              <p className="text-gray-500 dark:text-gray-400">No articles yet.</p>
            )}
          </div>
        </div>
      </div>
    </div>
  );
}
