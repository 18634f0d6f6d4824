import type { MapMarker } from "@shared/schema";

const BRAND_PRIMARY = "#E4572E";

// JSON embedded in a <script> block must not close it
function scriptJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, "\\u003c");
}

export function getEmptyMapHtml(): string {
  return `<!DOCTYPE html><html><head><meta name="viewport" content="width=device-width,initial-scale=1"><style>body{margin:0;display:flex;align-items:center;justify-content:center;height:100vh;font-family:-apple-system,sans-serif;background:#f5f5f5}.msg{color:#666;font-size:14px}</style></head><body><div class="msg">No locations to show</div></body></html>`;
}

function hasCoordinates(marker: MapMarker): boolean {
  return Number.isFinite(marker.lat) && Number.isFinite(marker.lng) && !(marker.lat === 0 && marker.lng === 0);
}

/**
 * Standalone Google Maps page with one numbered marker per location.
 */
export function renderMapHtml(markers: MapMarker[], apiKey: string): string {
  const places = markers.filter(hasCoordinates);
  if (places.length === 0) {
    return getEmptyMapHtml();
  }

  const center = {
    lat: places.reduce((sum, p) => sum + p.lat, 0) / places.length,
    lng: places.reduce((sum, p) => sum + p.lng, 0) / places.length,
  };

  const markersJson = scriptJson(places.map((p, i) => ({
    position: { lat: p.lat, lng: p.lng },
    label: String(i + 1),
    title: p.name || `Stop ${i + 1}`,
  })));

  return `<!DOCTYPE html>
<html>
<head>
<meta name="viewport" content="width=device-width,initial-scale=1,maximum-scale=1,user-scalable=no">
<style>*{margin:0;padding:0;box-sizing:border-box}html,body{width:100%;height:100%;overflow:hidden}#map{width:100%;height:100%}.iw{padding:8px;max-width:180px;font-weight:700;font-size:13px}</style>
<script src="https://maps.googleapis.com/maps/api/js?key=${encodeURIComponent(apiKey)}"></script>
</head>
<body>
<div id="map"></div>
<script>
const places=${markersJson};
const center=${scriptJson(center)};
function init(){
const map=new google.maps.Map(document.getElementById('map'),{center,zoom:13,disableDefaultUI:true,zoomControl:true,gestureHandling:'greedy'});
const bounds=new google.maps.LatLngBounds();
places.forEach((p)=>{
const pos=new google.maps.LatLng(p.position.lat,p.position.lng);
bounds.extend(pos);
const m=new google.maps.Marker({position:pos,map,label:{text:p.label,color:'white',fontWeight:'bold',fontSize:'12px'},icon:{path:google.maps.SymbolPath.CIRCLE,scale:16,fillColor:'${BRAND_PRIMARY}',fillOpacity:1,strokeColor:'white',strokeWeight:3},title:p.title});
const box=document.createElement('div');
box.className='iw';
box.textContent=p.title;
const iw=new google.maps.InfoWindow({content:box});
m.addListener('click',()=>iw.open(map,m));
});
if(places.length>1)map.fitBounds(bounds,{top:20,right:20,bottom:20,left:20});
}
init();
</script>
</body>
</html>`;
}
