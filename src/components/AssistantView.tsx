import { useRef, useState, useEffect, type FormEvent } from 'react';
import { Bot, Loader2, Send, Sparkles, User } from 'lucide-react';
import { SAMPLE_QUESTIONS } from '../constants';
import { fetchDailySummary, fetchGuidance, sendChat, useApi } from '../lib/api';
import type { ChatMessage, StakeholderId } from '../types';
import { GuidancePanel } from './GuidancePanel';
import { ErrorState, LoadingState, Panel } from './Panel';

export function AssistantView({ stakeholder, audience }: { stakeholder: StakeholderId; audience: string }) {
  const [messages, setMessages] = useState<ChatMessage[]>([]);
  const [suggestions, setSuggestions] = useState<string[]>(SAMPLE_QUESTIONS);
  const [sources, setSources] = useState<string[]>([]);
  const [draft, setDraft] = useState('');
  const [pending, setPending] = useState(false);
  const [unavailable, setUnavailable] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const summary = useApi(signal => fetchDailySummary(signal), []);
  const guidance = useApi(signal => fetchGuidance('assistant', stakeholder, signal), [stakeholder]);
  const bottomRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    bottomRef.current?.scrollIntoView({ behavior: 'smooth' });
  }, [messages, pending]);

  const ask = (question: string) => {
    const content = question.trim();
    if (!content || pending) return;
    const history: ChatMessage[] = [...messages, { role: 'user', content }];
    setMessages(history);
    setDraft('');
    setPending(true);
    setError(null);
    sendChat(history, stakeholder)
      .then(response => {
        setMessages([...history, { role: 'assistant', content: response.reply }]);
        setSuggestions(response.suggestions);
        setSources(response.contextSources);
        setUnavailable(response.status === 'unavailable');
      })
      .catch((err: unknown) => setError(err instanceof Error ? err.message : String(err)))
      .finally(() => setPending(false));
  };

  const handleSubmit = (event: FormEvent) => {
    event.preventDefault();
    ask(draft);
  };

  return (
    <div className="grid grid-cols-1 lg:grid-cols-3 gap-8">
      <div className="lg:col-span-2">
        <Panel title="Environmental Assistant" icon={<Bot className="w-5 h-5" />} action={<span className="text-[10px] text-slate-400">Answering for {audience}</span>}>
          {unavailable && (
            <div className="mb-4 p-3 rounded-2xl bg-amber-50 border border-amber-100 text-xs text-amber-800">
              The assistant is not configured on this server. Dashboards still work.
            </div>
          )}
          <div className="h-[420px] overflow-y-auto space-y-4 pr-2">
            {messages.length === 0 && (
              <p className="text-sm text-slate-400">Ask about temperature, air quality, lakes or growth in the city.</p>
            )}
            {messages.map((message, i) => (
              <div key={i} className={`flex gap-3 ${message.role === 'user' ? 'justify-end' : ''}`}>
                {message.role === 'assistant' && <Bot className="w-5 h-5 text-emerald-600 shrink-0 mt-1" />}
                <div
                  className={`max-w-[80%] p-4 rounded-2xl text-sm whitespace-pre-wrap ${
                    message.role === 'user' ? 'bg-emerald-600 text-white' : 'bg-slate-50 border border-slate-100 text-slate-700'
                  }`}
                >
                  {message.content}
                </div>
                {message.role === 'user' && <User className="w-5 h-5 text-slate-400 shrink-0 mt-1" />}
              </div>
            ))}
            {pending && (
              <div className="flex items-center gap-2 text-xs text-slate-400">
                <Loader2 className="w-4 h-4 animate-spin" /> Thinking…
              </div>
            )}
            <div ref={bottomRef} />
          </div>

          {error && <p className="text-xs text-red-600 mt-3">{error}</p>}
          {sources.length > 0 && <p className="text-[10px] text-slate-400 mt-3">Used: {sources.join(', ')}</p>}

          <div className="flex flex-wrap gap-2 mt-4">
            {suggestions.map(suggestion => (
              <button
                key={suggestion}
                onClick={() => ask(suggestion)}
                disabled={pending}
                className="px-3 py-1.5 rounded-full border border-slate-200 bg-white text-xs text-slate-600 hover:border-emerald-300 disabled:opacity-50"
              >
                {suggestion}
              </button>
            ))}
          </div>

          <form onSubmit={handleSubmit} className="flex gap-2 mt-4">
            <input
              value={draft}
              onChange={e => setDraft(e.target.value)}
              placeholder="Ask a question…"
              maxLength={4000}
              className="flex-1 px-4 py-3 rounded-2xl border border-slate-200 bg-white text-sm focus:outline-none focus:ring-2 focus:ring-emerald-500/20 focus:border-emerald-500"
            />
            <button
              type="submit"
              disabled={pending || !draft.trim()}
              className="px-4 rounded-2xl bg-emerald-600 text-white disabled:opacity-50"
            >
              <Send className="w-4 h-4" />
            </button>
          </form>
        </Panel>
      </div>

      <div className="space-y-8">
        {guidance.data && <GuidancePanel guidance={guidance.data} audience={audience} />}
        <Panel title="Today in Brief" icon={<Sparkles className="w-5 h-5" />}>
          {summary.loading && <LoadingState label="Writing summary…" />}
          {summary.error && <ErrorState message={summary.error} onRetry={summary.reload} />}
          {summary.data && <p className="text-sm text-slate-600 leading-relaxed whitespace-pre-wrap">{summary.data.text}</p>}
        </Panel>
      </div>
    </div>
  );
}
