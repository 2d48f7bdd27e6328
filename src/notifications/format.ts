import { statusOf, URGENCY_LABELS } from "../ledger/rows";
import type { AppendedRequest, LedgerRequest, RequestDetails, RequestStatus, WeeklyAggregate } from "../types";

const STATUS_GLYPHS: Record<RequestStatus, string> = {
  fulfilled: "✅",
  cancelled: "❌",
  pending: "⏳"
};

export const TRY_AGAIN_LATER = "❌ Der Bestellspeicher ist gerade nicht erreichbar. Bitte versuche es später erneut.";

export function statusGlyph(fulfillmentStatus: string): string {
  return STATUS_GLYPHS[statusOf(fulfillmentStatus)];
}

export function articlePrompt(firstName?: string): string {
  const greeting = firstName ? `👋 Hallo ${firstName}!\n\nIch helfe dir, Bestellanfragen zu erfassen.` : "👋 Neue Bestellung:";
  return `${greeting}\n\n📦 1/5: Welcher Artikel?\n\n(/abbrechen zum Beenden)`;
}

export function quantityPrompt(article: string): string {
  return `✅ Artikel: ${article}\n\n🔢 2/5: Welche Menge?`;
}

export function urgencyPrompt(quantity: string): string {
  return `✅ Menge: ${quantity}\n\n⏰ 3/5: Dringend oder normal?`;
}

export function costCenterPrompt(urgencyLabel: string): string {
  return `✅ Dringlichkeit: ${urgencyLabel}\n\n💰 4/5: Für welche Kostenstelle ist die Bestellung?`;
}

export function attachmentPrompt(costCenter: string): string {
  return `✅ Kostenstelle: ${costCenter}\n\n📸 5/5: Möchtest du ein Foto anhängen?\n\nSende ein Foto oder tippe /weiter um ohne Foto fortzufahren.`;
}

function detailLines(details: RequestDetails): string {
  return (
    `📦 Artikel: ${details.article}\n` +
    `🔢 Menge: ${details.quantity}\n` +
    `⏰ Dringlichkeit: ${URGENCY_LABELS[details.urgency]}\n` +
    `💰 Kostenstelle: ${details.costCenter}`
  );
}

export function confirmationPrompt(details: RequestDetails): string {
  const photo = details.attachmentReference ? "\n📸 Foto: Ja" : "";
  return `📋 Bestellungsübersicht:\n\n${detailLines(details)}${photo}\n\n❓ Ist alles richtig?`;
}

export function submittedReply(request: AppendedRequest): string {
  const photo = request.attachmentReference ? "\n📸 Mit Foto" : "";
  return (
    `✅ Bestellanfrage ${request.orderNumber} erfasst!\n\n` +
    `${detailLines(request)}${photo}\n\n` +
    "Du wirst benachrichtigt, wenn bestellt wurde.\n\n" +
    "📋 /meine_bestellungen - Deine offenen Bestellungen\n" +
    "🆕 /start - Neue Anfrage"
  );
}

export const SAVE_FAILED =
  "❌ Fehler beim Speichern!\n\nBitte versuche es später erneut oder kontaktiere den Administrator.\n\nFür eine neue Anfrage: /start";

export const ORDER_ABORTED = "❌ Anfrage abgebrochen.\n\nFür eine neue Anfrage: /start";

export const RESTARTING = "🔄 Okay, lass uns nochmal von vorne anfangen!";

export function pendingList(requests: LedgerRequest[]): string {
  if (requests.length === 0) {
    return "📋 Du hast keine offenen Bestellungen.\n\n/start - Neue Bestellung aufgeben";
  }
  let message = "📋 Deine offenen Bestellungen:\n\n";
  for (const r of requests) {
    message +=
      `${r.orderNumber} - ${r.article}\n` +
      `   Menge: ${r.quantity} | ${r.urgency}\n` +
      `   Kostenstelle: ${r.costCenter}\n` +
      `   Datum: ${r.createdAt}\n\n`;
  }
  return message + "/stornieren - Bestellung stornieren\n/start - Neue Bestellung";
}

export const NOTHING_TO_CANCEL = "📋 Du hast keine offenen Bestellungen zum Stornieren.\n\n/start - Neue Bestellung aufgeben";

export const CANCEL_PROMPT = "🗑️ Welche Bestellung möchtest du stornieren?\n\nWähle eine Bestellung:";

export const CANCEL_ABORTED = "❌ Stornierung abgebrochen.";

export const CANCEL_FAILED = "❌ Fehler beim Stornieren. Bitte versuche es später erneut.";

export function alreadyProcessed(orderNumber: string): string {
  return `ℹ️ Bestellung ${orderNumber} wurde inzwischen bearbeitet und kann nicht mehr storniert werden.`;
}

export function cancelOptionLabel(request: LedgerRequest): string {
  return `${request.orderNumber} - ${request.article}`;
}

export function cancelledReply(request: LedgerRequest): string {
  return (
    `✅ Bestellung ${request.orderNumber} wurde storniert.\n\n` +
    `📦 ${request.article} x ${request.quantity}\n\n` +
    "/meine_bestellungen - Offene Bestellungen\n" +
    "/start - Neue Bestellung"
  );
}

export const SEARCH_USAGE =
  "🔍 Bestellungen suchen\n\nVerwendung: /suche Suchbegriff\n\nBeispiele:\n- /suche Druckerpapier\n- /suche IT\n- /suche Max";

export function searchResults(term: string, results: LedgerRequest[]): string {
  if (results.length === 0) {
    return `🔍 Keine Ergebnisse für "${term}"\n\nVersuche einen anderen Suchbegriff.`;
  }
  let message = `🔍 Suchergebnisse für '${term}':\n\n`;
  for (const r of results) {
    message +=
      `${statusGlyph(r.fulfillmentStatus)} ${r.orderNumber} - ${r.article}\n` +
      `   ${r.requesterName} | ${r.quantity} | ${r.costCenter}\n` +
      `   ${r.createdAt}\n\n`;
  }
  return message.trimEnd();
}

export function weeklyStats(stats: WeeklyAggregate, title = "📊 Wochenübersicht"): string {
  let message =
    `${title}\n\n` +
    `📦 Gesamt: ${stats.total} Bestellungen\n` +
    `⏳ Offen: ${stats.pending}\n` +
    `✅ Bestellt: ${stats.fulfilled}\n` +
    `❌ Storniert: ${stats.cancelled}`;
  if (stats.byCostCenter.size > 0) {
    message += "\n\nNach Kostenstelle:";
    for (const [costCenter, count] of stats.byCostCenter) {
      message += `\n  ${costCenter}: ${count}`;
    }
  }
  return message;
}

export const WEEKLY_SUMMARY_TITLE = "📅 Wöchentliche Zusammenfassung";

export const STATS_FAILED = "Fehler beim Laden der Statistik.";

export function adminNewRequest(request: AppendedRequest): string {
  return `🆕 Neue Bestellung ${request.orderNumber}\n\n👤 Von: ${request.requesterName}\n${detailLines(request)}`;
}

export function adminPhotoCaption(orderNumber: string): string {
  return `📸 Foto für Bestellung ${orderNumber}`;
}

export function adminCancelled(request: LedgerRequest, firstName: string): string {
  return (
    `🗑️ Bestellung ${request.orderNumber} STORNIERT\n\n` +
    `👤 Von: ${firstName}\n` +
    `📦 Artikel: ${request.article}\n` +
    `🔢 Menge: ${request.quantity}`
  );
}

export const HELP_TEXT =
  "🤖 Beschaffungs-Bot Hilfe\n\n" +
  "Befehle:\n" +
  "/start - Neue Bestellanfrage starten\n" +
  "/meine_bestellungen - Offene Bestellungen anzeigen\n" +
  "/stornieren - Bestellung stornieren\n" +
  "/suche [Begriff] - Bestellungen suchen\n" +
  "/statistik - Wochenübersicht\n" +
  "/abbrechen - Aktuelle Anfrage abbrechen\n" +
  "/meine_id - Deine Chat-ID anzeigen\n" +
  "/hilfe - Diese Hilfe anzeigen\n\n" +
  "Bei Problemen kontaktiere deinen Administrator.";

export function identityText(identity: string): string {
  return `🔑 Deine Chat-ID: ${identity}\n\nFüge diese in die .env Datei ein:\nADMIN_CHAT_ID=${identity}`;
}

export const NO_ACTIVE_FLOW = "🤔 Gerade läuft keine Anfrage.\n\n/start - Neue Bestellung\n/hilfe - Alle Befehle";

export const NOTHING_TO_ABORT = "Es läuft gerade keine Anfrage.\n\n/start - Neue Bestellung";

export const PHOTO_RECEIVED = "📸 Foto erhalten!";

export const EMPTY_ANSWER = "Bitte gib einen Text ein.";

export const URGENCY_INVALID = "Bitte wähle Dringend oder Normal:";

export const COST_CENTER_INVALID = "Diese Kostenstelle kenne ich nicht. Bitte wähle eine aus der Liste:";

export const ATTACHMENT_REMINDER = "📸 Sende ein Foto oder tippe /weiter um ohne Foto fortzufahren.";

export const ANSWER_LAST_QUESTION = "Bitte beantworte zuerst die letzte Frage.";

export const USE_BUTTONS = "Bitte nutze die Schaltflächen der letzten Nachricht.";

export const PHOTO_NOT_EXPECTED = "Ein Foto kann erst im Schritt 5/5 angehängt werden.";

export const STALE_CHOICE = "Diese Auswahl ist nicht mehr aktuell.";

export const UNKNOWN_COMMAND = "Diesen Befehl kenne ich nicht.\n\n/hilfe - Alle Befehle";
