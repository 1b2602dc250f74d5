// Plain-text renderings of tool results for the generation context.

import type { CityEvent, DistrictReport, Facility, SportEvent, ToolResult } from './tool-contract';

function line(label: string, value: string | undefined): string[] {
  return value ? [`   ${label}: ${value}`] : [];
}

export function formatFacility(facility: Facility): string {
  return [
    `- ${facility.name}`,
    ...line('Адрес', facility.address),
    ...line('Метро', facility.nearestMetro),
    ...line('Телефон', facility.phones.join(', ')),
    ...line('Часы работы', facility.workingHours),
    ...line('Расстояние', facility.distanceKm !== undefined ? `${facility.distanceKm.toFixed(1)} км` : undefined),
    ...line('Услуги', facility.services.join(', ')),
    ...line('Ссылка', facility.link),
  ].join('\n');
}

export function formatDistrictReport(report: DistrictReport): string {
  return [
    ...(report.district ? [`Район: ${report.district}`] : []),
    ...(report.address ? [`Адрес: ${report.address}`] : []),
    ...report.facts.map((fact) => `- ${fact.label}: ${fact.value}`),
  ].join('\n');
}

function period(start?: string, end?: string): string | undefined {
  if (start && end && start !== end) return `${start} - ${end}`;
  return start ?? end;
}

export function formatEvent(event: CityEvent): string {
  return [
    `- ${event.title}`,
    ...line('Категории', event.categories.join(', ')),
    ...line('Даты', period(event.startDate, event.endDate)),
    ...line('Место', event.place),
    ...line('Адрес', event.address),
    ...line('Возраст', event.ageLimit),
    ...line('Описание', event.description),
  ].join('\n');
}

export function formatSportEvent(event: SportEvent): string {
  const flags = [event.accessible ? 'доступно для людей с ОВЗ' : '', event.familyHour ? 'семейный час' : '']
    .filter(Boolean)
    .join(', ');
  return [
    `- ${event.title}`,
    ...line('Вид спорта', event.disciplines.join(', ')),
    ...line('Даты', period(event.startDate, event.endDate)),
    ...line('Время', event.startTime),
    ...line('Район', event.district),
    ...line('Адрес', event.address),
    ...line('Особенности', flags),
    ...line('Описание', event.description),
  ].join('\n');
}

/** Text block for one tool result; empty results render as an explicit "nothing found". */
export function formatToolResult(result: ToolResult): string {
  switch (result.tool) {
    case 'facility_search':
      return result.facilities.length > 0
        ? `Найденные МФЦ:\n${result.facilities.map(formatFacility).join('\n')}`
        : 'МФЦ по запросу не найдены.';
    case 'district_info':
      return result.report && result.report.facts.length > 0
        ? `Справка по району:\n${formatDistrictReport(result.report)}`
        : 'Справка по району не найдена.';
    case 'events_search':
      return result.events.length > 0
        ? `Мероприятия:\n${result.events.map(formatEvent).join('\n')}`
        : 'Мероприятий на выбранные даты не найдено.';
    case 'sport_events_search':
      return result.events.length > 0
        ? `Спортивные мероприятия:\n${result.events.map(formatSportEvent).join('\n')}`
        : 'Спортивных мероприятий не найдено.';
  }
}
