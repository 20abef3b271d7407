import { createClient } from '@supabase/supabase-js';
import { config } from './config';
import type { GradeDiagnostics, OutcomeTag, ReasonCode } from '../types/opportunity';
import type { GradeLetter } from './grading-method';

// Only create the client if we have the required keys
export const supabaseAdmin = config.supabaseUrl && config.supabaseServiceRoleKey
  ? createClient(
      config.supabaseUrl,
      config.supabaseServiceRoleKey,
      {
        auth: {
          autoRefreshToken: false,
          persistSession: false,
        },
      }
    )
  : null;

// Database types
export interface Database {
  public: {
    Tables: {
      betting_data: {
        Row: {
          id: string;
          identity: string;
          ev_percent: string | number | null;
          odds: string | number | null;
          line: string | null;
          event_identity: string;
          event_start_time: string | null;
          observed_at: string;
          sport: string;
          league: string;
          sportsbook: string;
          description: string;
          bet_category: string;
          created_at: string;
        };
        Insert: {
          identity: string;
          ev_percent?: string | number | null;
          odds?: string | number | null;
          line?: string | null;
          event_identity: string;
          event_start_time?: string | null;
          observed_at: string;
          sport: string;
          league: string;
          sportsbook: string;
          description: string;
          bet_category: string;
        };
        Update: {
          ev_percent?: string | number | null;
          odds?: string | number | null;
          line?: string | null;
          event_start_time?: string | null;
        };
      };
      bet_grades: {
        Row: {
          id: string;
          identity: string;
          evaluated_at: string;
          ev_score: number;
          timing_score: number;
          ev_trend_score: number;
          bayesian_confidence: number;
          composite_score: number;
          grade_letter: GradeLetter;
          grading_method_version: string;
          diagnostics: GradeDiagnostics;
          created_at: string;
        };
        Insert: {
          id: string;
          identity: string;
          evaluated_at: string;
          ev_score: number;
          timing_score: number;
          ev_trend_score: number;
          bayesian_confidence: number;
          composite_score: number;
          grade_letter: GradeLetter;
          grading_method_version: string;
          diagnostics: GradeDiagnostics;
        };
        Update: Record<string, never>;
      };
      bet_outcome_evaluation: {
        Row: {
          identity: string;
          evaluated_at: string;
          outcome: OutcomeTag;
          matched_value: number | null;
          reason: string;
          reason_code: ReasonCode;
          updated_at: string;
        };
        Insert: {
          identity: string;
          evaluated_at: string;
          outcome: OutcomeTag;
          matched_value: number | null;
          reason: string;
          reason_code: ReasonCode;
        };
        Update: {
          evaluated_at?: string;
          outcome?: OutcomeTag;
          matched_value?: number | null;
          reason?: string;
          reason_code?: ReasonCode;
        };
      };
      game_stats: {
        Row: {
          id: number;
          event_identity: string;
          event_date: string;
          team: string;
          subject_name: string;
          stat_category: string;
          stat_value: number | null;
        };
        Insert: {
          event_identity: string;
          event_date: string;
          team: string;
          subject_name: string;
          stat_category: string;
          stat_value: number | null;
        };
        Update: {
          stat_value?: number | null;
        };
      };
    };
  };
}

export type TableName = keyof Database['public']['Tables'];
export type TableInsert<T extends TableName> = Database['public']['Tables'][T]['Insert'];
