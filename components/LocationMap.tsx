"use client";

import { useEffect, useRef } from "react";
import L from "leaflet";
import "leaflet/dist/leaflet.css";

interface LocationMapProps {
  lat: number;
  lon: number;
  label: string;
  /** Fired when the grower drops or drags the pin */
  onPick: (lat: number, lon: number) => void;
}

const ICON_BASE = "https://unpkg.com/leaflet@1.9.4/dist/images";

const pinIcon = L.icon({
  iconUrl: `${ICON_BASE}/marker-icon.png`,
  iconRetinaUrl: `${ICON_BASE}/marker-icon-2x.png`,
  shadowUrl: `${ICON_BASE}/marker-shadow.png`,
  iconSize: [25, 41],
  iconAnchor: [12, 41],
  popupAnchor: [1, -34],
});

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function popupHtml(title: string, lat: number, lon: number): string {
  return `<b>${escapeHtml(title)}</b><br/>📍 ${lat.toFixed(4)}, ${lon.toFixed(4)}`;
}

export default function LocationMap({ lat, lon, label, onPick }: LocationMapProps) {
  const mapRef = useRef<HTMLDivElement>(null);
  const mapInstanceRef = useRef<L.Map | null>(null);
  const markerRef = useRef<L.Marker | null>(null);
  const onPickRef = useRef(onPick);

  useEffect(() => {
    onPickRef.current = onPick;
  }, [onPick]);

  // Initialize map (once)
  useEffect(() => {
    if (!mapRef.current || mapInstanceRef.current) return;

    const map = L.map(mapRef.current, { zoomControl: true, scrollWheelZoom: false }).setView([lat, lon], 9);

    L.tileLayer("https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png", {
      attribution: '&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a>',
      maxZoom: 18,
    }).addTo(map);

    const marker = L.marker([lat, lon], { draggable: true, icon: pinIcon })
      .addTo(map)
      .bindPopup(popupHtml(label, lat, lon));

    const pick = (pos: L.LatLng) => {
      marker.setLatLng(pos).setPopupContent(popupHtml("Selected field", pos.lat, pos.lng)).openPopup();
      onPickRef.current(pos.lat, pos.lng);
    };
    map.on("click", (e: L.LeafletMouseEvent) => pick(e.latlng));
    marker.on("dragend", () => pick(marker.getLatLng()));

    mapInstanceRef.current = map;
    markerRef.current = marker;

    const sizeTimer = setTimeout(() => map.invalidateSize(), 100);

    return () => {
      clearTimeout(sizeTimer);
      map.remove();
      mapInstanceRef.current = null;
      markerRef.current = null;
    };
  }, []); // eslint-disable-line react-hooks/exhaustive-deps

  // Follow coordinates set from outside (GPS, history selection)
  useEffect(() => {
    const map = mapInstanceRef.current;
    const marker = markerRef.current;
    if (!map || !marker) return;
    const latlng = L.latLng(lat, lon);
    map.setView(latlng, map.getZoom(), { animate: true });
    marker.setLatLng(latlng).setPopupContent(popupHtml(label, lat, lon));
  }, [lat, lon, label]);

  return (
    <div className="relative h-full w-full">
      <div ref={mapRef} className="h-full w-full rounded-lg" style={{ minHeight: "200px" }} />
      <div className="absolute bottom-2 left-2 z-[1000] rounded bg-white/90 px-2 py-1 text-[9px] text-slate-500 shadow-sm pointer-events-none">
        Click the map or drag the pin to set your field
      </div>
    </div>
  );
}
